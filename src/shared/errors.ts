/**
 * Error classes for mailsink
 *
 * Structured errors with codes and the status they map to on either protocol
 */

export class MailSinkError extends Error {
    readonly code: ErrorCode;
    readonly statusCode?: number;
    readonly smtpCode?: number;
    readonly originalError?: unknown;

    constructor(
        message: string,
        code: ErrorCode,
        options?: {
            statusCode?: number;
            smtpCode?: number;
            originalError?: unknown;
        }
    ) {
        super(message);
        this.name = "MailSinkError";
        this.code = code;
        this.statusCode = options?.statusCode;
        this.smtpCode = options?.smtpCode;
        this.originalError = options?.originalError;
    }
}

// Error codes
export const ErrorCodes = {
    // Storage
    STORE_IO: "STORE_IO",
    DECODE_ERROR: "DECODE_ERROR",

    // Query API
    INVALID_QUERY: "INVALID_QUERY",

    // Ingestion
    MESSAGE_TOO_LARGE: "MESSAGE_TOO_LARGE",
    PARSE_ERROR: "PARSE_ERROR",

    // Internal
    INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Map any thrown value to an HTTP status
 */
export function toHttpStatus(error: unknown): 400 | 404 | 500 {
    if (!(error instanceof MailSinkError)) {
        return 500;
    }

    if (error.statusCode === 400 || error.code === ErrorCodes.INVALID_QUERY) {
        return 400;
    }

    if (error.statusCode === 404) {
        return 404;
    }

    return 500;
}

/**
 * Map any thrown value to an SMTP reply code
 */
export function toSmtpCode(error: unknown): number {
    if (!(error instanceof MailSinkError)) {
        return 451; // Local error in processing
    }

    if (error.smtpCode) {
        return error.smtpCode;
    }

    if (error.code === ErrorCodes.MESSAGE_TOO_LARGE) {
        return 552; // Message too large
    }

    // STORE_IO, PARSE_ERROR, DECODE_ERROR, INTERNAL_ERROR
    return 451;
}

/**
 * Error message for logging
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
