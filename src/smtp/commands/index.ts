/**
 * SMTP Command Handler Registry
 * Drives the per-connection ingestion state machine
 */
import type { Logger, ServerConfig, SmtpCommand, SmtpReply, SmtpSession } from "../../shared/types.js";
import { toSmtpCode, errorMessage } from "../../shared/errors.js";
import type { MailStore } from "../../store/index.js";
import { parseCommand, parseMailFrom, parseRcptTo, unstuffDataLine } from "../parser.js";
import { reply } from "../formatter.js";
import { assembleMail } from "../message.js";

export interface SmtpContext {
    store: MailStore;
    logger: Logger;
    config: Pick<ServerConfig, "hostname" | "maxMessageSize" | "maxRecipients">;
}

type CommandHandler = (session: SmtpSession, command: SmtpCommand, context: SmtpContext) => SmtpReply;

/**
 * Handle one line from the client: a command, or a line of message data
 * @returns the reply to send, or null while message data is being received
 */
export async function handleLine(
    session: SmtpSession,
    line: string,
    context: SmtpContext
): Promise<SmtpReply | null> {
    if (session.state === "closed") {
        return null;
    }

    if (session.state === "receiving_data") {
        return handleDataLine(session, line, context);
    }

    const command = parseCommand(line);
    if (!command) {
        return reply(500, "Syntax error, command unrecognized");
    }

    return handleCommand(session, command, context);
}

/**
 * Handle an SMTP command
 */
export function handleCommand(session: SmtpSession, command: SmtpCommand, context: SmtpContext): SmtpReply {
    const handler = handlers[command.name];

    if (!handler) {
        return reply(500, `Command not recognized: ${command.name}`);
    }

    // State validation
    const stateError = validateState(session, command.name);
    if (stateError) {
        return reply(503, stateError);
    }

    return handler(session, command, context);
}

function validateState(session: SmtpSession, command: string): string | null {
    // Transaction commands need a greeting first
    if (["MAIL", "RCPT", "DATA"].includes(command) && session.state === "connected") {
        return "Bad sequence of commands: send HELO/EHLO first";
    }

    switch (command) {
        case "MAIL":
            if (session.state !== "greeted") {
                return "Bad sequence of commands: sender already specified";
            }
            return null;
        case "RCPT":
            if (session.state === "greeted") {
                return "Bad sequence of commands: need MAIL command first";
            }
            return null;
        case "DATA":
            if (session.state === "greeted") {
                return "Bad sequence of commands: need MAIL command first";
            }
            if (session.state === "have_sender") {
                return "Bad sequence of commands: need RCPT command first";
            }
            return null;
        default:
            return null;
    }
}

/**
 * Start a fresh transaction, keeping the greeting
 */
export function resetTransaction(session: SmtpSession): void {
    session.envelope = { to: [] };
    session.dataLines = [];
    session.dataSize = 0;
    session.dataOverflow = false;
    if (session.state !== "connected" && session.state !== "closed") {
        session.state = "greeted";
    }
}

// ============================================================================
// Data phase
// ============================================================================

async function handleDataLine(session: SmtpSession, line: string, context: SmtpContext): Promise<SmtpReply | null> {
    if (line !== ".") {
        const content = unstuffDataLine(line);
        session.dataSize += Buffer.byteLength(content, "utf-8") + 2;
        if (session.dataSize > context.config.maxMessageSize) {
            // Keep reading until the terminator, but stop buffering
            session.dataOverflow = true;
            session.dataLines = [];
        }
        if (!session.dataOverflow) {
            session.dataLines.push(content);
        }
        return null;
    }

    const { envelope, dataLines, dataOverflow, dataSize } = session;
    resetTransaction(session);

    if (dataOverflow) {
        context.logger.warn("smtp", `Rejected ${dataSize} byte message from ${session.remoteAddress}`);
        return reply(552, "Message exceeds fixed maximum message size");
    }

    try {
        const mail = await assembleMail({ from: envelope.from ?? "", to: envelope.to }, dataLines);
        context.store.put(mail.id, mail);
        session.transactions++;
        context.logger.info(
            "smtp",
            `Stored ${mail.id} From: ${mail.from}, To: ${mail.to.join(", ")}, Subject: ${mail.subject}`
        );
        return reply(250, `OK: queued as ${mail.id}`);
    } catch (error) {
        const code = toSmtpCode(error);
        context.logger.error("smtp", `Could not store message (${code}): ${errorMessage(error)}`);
        return reply(code, "Requested action aborted: local error in processing");
    }
}

// ============================================================================
// Command Handlers
// ============================================================================

const notImplemented: CommandHandler = (session, command) => {
    return reply(502, `${command.name} not implemented`);
};

const handlers: Record<string, CommandHandler> = {
    HELO: (session, command, context) => {
        if (!command.argument) {
            return reply(501, "Syntax: HELO hostname");
        }
        session.state = "greeted";
        session.clientHostname = command.argument;
        resetTransaction(session);
        return reply(250, `${context.config.hostname} Hello ${command.argument}`);
    },

    EHLO: (session, command, context) => {
        if (!command.argument) {
            return reply(501, "Syntax: EHLO hostname");
        }
        session.state = "greeted";
        session.clientHostname = command.argument;
        resetTransaction(session);
        return reply(
            250,
            `${context.config.hostname} Hello ${command.argument}`,
            `SIZE ${context.config.maxMessageSize}`,
            "8BITMIME"
        );
    },

    MAIL: (session, command) => {
        const from = parseMailFrom(command.argument);
        if (from === null) {
            return reply(501, "Syntax: MAIL FROM:<address>");
        }
        session.envelope = { from, to: [] };
        session.state = "have_sender";
        return reply(250, "OK");
    },

    RCPT: (session, command, context) => {
        const to = parseRcptTo(command.argument);
        if (!to) {
            return reply(501, "Syntax: RCPT TO:<address>");
        }
        if (session.envelope.to.length >= context.config.maxRecipients) {
            return reply(452, "Too many recipients");
        }
        session.envelope.to.push(to);
        session.state = "have_recipient";
        return reply(250, "OK");
    },

    DATA: (session) => {
        session.state = "receiving_data";
        session.dataLines = [];
        session.dataSize = 0;
        session.dataOverflow = false;
        return reply(354, "End data with <CR><LF>.<CR><LF>");
    },

    RSET: (session) => {
        resetTransaction(session);
        return reply(250, "OK");
    },

    NOOP: () => {
        return reply(250, "OK");
    },

    VRFY: () => {
        return reply(252, "Cannot VRFY user, but will accept message");
    },

    QUIT: (session, command, context) => {
        session.state = "closed";
        return reply(221, `${context.config.hostname} closing connection`);
    },

    STARTTLS: notImplemented,
    AUTH: notImplemented,
    EXPN: notImplemented,
    HELP: notImplemented,
    TURN: notImplemented,
};
