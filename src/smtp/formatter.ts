/**
 * SMTP Reply Formatter
 */
import type { SmtpReply } from "../shared/types.js";

export function reply(code: number, ...lines: string[]): SmtpReply {
    return { code, lines };
}

/**
 * Format a reply for sending (without the final CRLF).
 * Multi-line replies use "code-text" for every line but the last.
 */
export function formatReply(response: SmtpReply): string {
    const lines = response.lines.length > 0 ? response.lines : [""];
    return lines
        .map((line, index) => {
            const separator = index === lines.length - 1 ? " " : "-";
            return `${response.code}${separator}${line}`;
        })
        .join("\r\n");
}
