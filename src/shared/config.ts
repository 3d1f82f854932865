/**
 * Server configuration
 *
 * Centralized configuration with environment variable support
 */

import { randomBytes } from "crypto";

import type { ServerConfig, Logger, LogLevel, ListDecodePolicy } from "./types.js";

export const SERVER_NAME = "mailsink";
export const SERVER_VERSION = "0.1.0";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const devMode = env.NODE_ENV === "development";

    return {
        smtpHost: env.SMTP_HOST || "127.0.0.1",
        smtpPort: parseInt(env.SMTP_PORT || "2525", 10),
        httpHost: env.HTTP_HOST || "127.0.0.1",
        httpPort: parseInt(env.HTTP_PORT || "8025", 10),
        hostname: env.MAIL_HOSTNAME || "localhost",
        apiKey: env.API_KEY || "",
        dbPath: env.DB_PATH || ".data/mails.db",
        devMode,
        logLevel: parseLogLevel(env.LOG_LEVEL, devMode ? "debug" : "info"),
        maxMessageSize: parseInt(env.MAX_MESSAGE_SIZE || "10485760", 10), // 10MB
        maxRecipients: parseInt(env.MAX_RECIPIENTS || "100", 10),
        socketTimeout: parseInt(env.SOCKET_TIMEOUT || "300000", 10), // 5 min
        listDecodePolicy: parseListDecodePolicy(env.LIST_DECODE_POLICY),
    };
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
    return level ?? fallback;
}

function parseListDecodePolicy(value: string | undefined): ListDecodePolicy {
    return value?.toLowerCase() === "skip" ? "skip" : "fail-fast";
}

/**
 * Random shared secret for when none is configured
 */
export function generateApiKey(): string {
    return randomBytes(16).toString("hex");
}

const CONSOLE_SINKS: Record<LogLevel, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.log(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

/**
 * Console logger; each line is prefixed with "[module]".
 * Levels below minLevel are dropped.
 */
export function createLogger(minLevel: LogLevel = "info"): Logger {
    const threshold = LOG_LEVELS.indexOf(minLevel);

    const at = (level: LogLevel): Logger[LogLevel] => {
        if (LOG_LEVELS.indexOf(level) < threshold) {
            return () => undefined;
        }
        const sink = CONSOLE_SINKS[level];
        return (module, message, ...args) => sink(`[${module}] ${message}`, ...args);
    };

    return {
        debug: at("debug"),
        info: at("info"),
        warn: at("warn"),
        error: at("error"),
    };
}

const HTML_ENTITIES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#039;",
};

/**
 * Escape text for an HTML element or attribute
 */
export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}
