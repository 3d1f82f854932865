/**
 * SMTP Command Parser
 * Parses SMTP command lines and envelope paths
 */
import type { SmtpCommand } from "../shared/types.js";

const COMMAND_PATTERN = /^([A-Za-z]+)(?:\s+(.*))?$/;

/**
 * Parse an SMTP command line
 * Format: VERB [argument]
 */
export function parseCommand(line: string): SmtpCommand | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    const match = trimmed.match(COMMAND_PATTERN);
    if (!match) return null;

    return {
        name: match[1].toUpperCase(),
        argument: match[2]?.trim() ?? "",
        raw: line,
    };
}

/**
 * MAIL FROM:<address> [params]
 * Returns "" for the null reverse path, null on bad syntax
 */
export function parseMailFrom(argument: string): string | null {
    return parsePath(argument, "FROM");
}

/**
 * RCPT TO:<address> [params]
 */
export function parseRcptTo(argument: string): string | null {
    return parsePath(argument, "TO");
}

function parsePath(argument: string, keyword: "FROM" | "TO"): string | null {
    const pattern = new RegExp(`^${keyword}:\\s*(?:<([^<>\\s]*)>|([^<>\\s]+))(?:\\s+.*)?$`, "i");
    const match = argument.match(pattern);
    if (!match) return null;
    return match[1] ?? match[2] ?? null;
}

/**
 * Undo dot-stuffing on a data line
 */
export function unstuffDataLine(line: string): string {
    return line.startsWith(".") ? line.slice(1) : line;
}
