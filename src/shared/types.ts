/**
 * Type definitions for mailsink
 *
 * Single source of truth for all data structures
 */

/**
 * Captured message. Immutable once stored.
 */
export interface Mail {
    id: string;
    from: string;
    to: string[];
    subject: string;
    body: string;
    receivedAt: Date;
}

/**
 * Mail record as sent over the query API
 */
export interface MailJson {
    id: string;
    from: string;
    to: string[];
    subject: string;
    body: string;
    received_at: string;
}

/**
 * What ListMails does with a stored record that cannot be decoded
 */
export type ListDecodePolicy = "fail-fast" | "skip";

/**
 * Server configuration
 */
export interface ServerConfig {
    /** SMTP listen address (default: 127.0.0.1) */
    smtpHost: string;
    /** SMTP port (default: 2525) */
    smtpPort: number;
    /** Query API listen address (default: 127.0.0.1) */
    httpHost: string;
    /** Query API port (default: 8025) */
    httpPort: number;
    /** Name announced in SMTP replies */
    hostname: string;
    /** Shared secret expected in the `k` query parameter; empty means generate one */
    apiKey: string;
    /** SQLite database file */
    dbPath: string;
    /** Development mode (debug logging) */
    devMode: boolean;
    /** Minimum log level */
    logLevel: LogLevel;
    /** Maximum message size in bytes (default: 10MB) */
    maxMessageSize: number;
    /** Maximum recipients per message (default: 100) */
    maxRecipients: number;
    /** Per-connection inactivity deadline in milliseconds (default: 5 min) */
    socketTimeout: number;
    /** Corrupt record handling when listing */
    listDecodePolicy: ListDecodePolicy;
}

/**
 * Log levels
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for dependency injection
 */
export interface Logger {
    debug(module: string, message: string, ...args: unknown[]): void;
    info(module: string, message: string, ...args: unknown[]): void;
    warn(module: string, message: string, ...args: unknown[]): void;
    error(module: string, message: string, ...args: unknown[]): void;
}

// ============================================================================
// SMTP Types
// ============================================================================

export type SmtpSessionState =
    | "connected"
    | "greeted"
    | "have_sender"
    | "have_recipient"
    | "receiving_data"
    | "closed";

export interface SmtpEnvelope {
    from?: string;
    to: string[];
}

export interface SmtpSession {
    id: string;
    remoteAddress: string;
    state: SmtpSessionState;
    clientHostname?: string;
    envelope: SmtpEnvelope;

    // Data phase accumulation
    dataLines: string[];
    dataSize: number;
    dataOverflow: boolean;

    // Messages committed on this connection
    transactions: number;
}

export interface SmtpCommand {
    name: string;
    argument: string;
    raw: string;
}

export interface SmtpReply {
    code: number;
    /** One entry per reply line; several produce a multi-line reply */
    lines: string[];
}

// ============================================================================
// HTTP Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequest {
    method: HttpMethod;
    path: string;
    /** Decoded query parameters, last value wins */
    query: Map<string, string>;
    /** Path parameters bound by the router */
    params: Map<string, string>;
}

export type HttpStatus = 200 | 400 | 404 | 500;

export interface HttpResponse {
    status: HttpStatus;
    contentType?: string;
    body?: string;
}
