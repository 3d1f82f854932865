/**
 * Mail assembly
 * Turns a completed envelope and its data lines into a Mail record
 */
import { simpleParser } from "mailparser";

import type { Mail } from "../shared/types.js";
import { MailSinkError, ErrorCodes } from "../shared/errors.js";
import { generateMailId } from "../shared/id.js";

// RFC 5322 field-name: printable ASCII except colon
const HEADER_FIELD = /^[!-9;-~]+:/;
const SUBJECT_FIELD = /^subject:/i;

/**
 * Split data lines into a header block and a body.
 * A header block opens with a header field and ends at the first empty line;
 * data without one is all body.
 */
export function splitMessage(lines: string[]): { headerLines: string[]; bodyLines: string[] } {
    const blank = lines.indexOf("");
    if (blank === -1 || !HEADER_FIELD.test(lines[0])) {
        return { headerLines: [], bodyLines: lines };
    }

    return {
        headerLines: lines.slice(0, blank),
        bodyLines: lines.slice(blank + 1),
    };
}

/**
 * Decoded Subject header, or "" when there is none
 */
export async function extractSubject(headerLines: string[]): Promise<string> {
    if (!headerLines.some((line) => SUBJECT_FIELD.test(line))) {
        return "";
    }

    try {
        const parsed = await simpleParser(`${headerLines.join("\r\n")}\r\n\r\n`, {
            skipHtmlToText: true,
            skipTextToHtml: true,
        });
        return parsed.subject ?? "";
    } catch (error) {
        throw new MailSinkError("Could not parse message headers", ErrorCodes.PARSE_ERROR, {
            originalError: error,
        });
    }
}

/**
 * Build the Mail record for a completed transaction
 */
export async function assembleMail(
    envelope: { from: string; to: string[] },
    dataLines: string[],
    receivedAt: Date = new Date()
): Promise<Mail> {
    const { headerLines, bodyLines } = splitMessage(dataLines);
    const subject = await extractSubject(headerLines);

    return {
        id: generateMailId(receivedAt),
        from: envelope.from,
        to: [...envelope.to],
        subject,
        body: bodyLines.join("\r\n"),
        receivedAt,
    };
}
