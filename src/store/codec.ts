/**
 * Mail record encodings
 *
 * The persisted form is a versioned JSON document stored as a BLOB. The wire
 * form is what the query API returns. The two are independent.
 */
import { z } from "zod";

import type { Mail, MailJson } from "../shared/types.js";
import { MailSinkError, ErrorCodes } from "../shared/errors.js";

const STORED_MAIL_VERSION = 1;

const StoredMailSchema = z.object({
    v: z.literal(STORED_MAIL_VERSION),
    id: z.string(),
    from: z.string(),
    to: z.array(z.string()),
    subject: z.string(),
    body: z.string(),
    receivedAt: z.number().int(),
});

type StoredMail = z.infer<typeof StoredMailSchema>;

/**
 * Encode a mail for the store
 */
export function encodeMail(mail: Mail): Buffer {
    const stored: StoredMail = {
        v: STORED_MAIL_VERSION,
        id: mail.id,
        from: mail.from,
        to: mail.to,
        subject: mail.subject,
        body: mail.body,
        receivedAt: mail.receivedAt.getTime(),
    };
    return Buffer.from(JSON.stringify(stored), "utf-8");
}

/**
 * Decode a stored mail
 * @throws MailSinkError with DECODE_ERROR for anything that is not a v1 record
 */
export function decodeMail(id: string, value: Buffer): Mail {
    let json: unknown;
    try {
        json = JSON.parse(value.toString("utf-8"));
    } catch (error) {
        throw new MailSinkError(`Stored mail ${id} is not valid JSON`, ErrorCodes.DECODE_ERROR, {
            originalError: error,
        });
    }

    const result = StoredMailSchema.safeParse(json);
    if (!result.success) {
        throw new MailSinkError(`Stored mail ${id} has an invalid shape`, ErrorCodes.DECODE_ERROR, {
            originalError: result.error,
        });
    }

    const stored = result.data;
    return {
        id: stored.id,
        from: stored.from,
        to: stored.to,
        subject: stored.subject,
        body: stored.body,
        receivedAt: new Date(stored.receivedAt),
    };
}

/**
 * Wire representation for the query API
 */
export function toMailJson(mail: Mail): MailJson {
    return {
        id: mail.id,
        from: mail.from,
        to: mail.to,
        subject: mail.subject,
        body: mail.body,
        received_at: mail.receivedAt.toISOString(),
    };
}
