/**
 * SMTP Server
 * Accepts SMTP connections and stores every completed message in the Mail Store
 */
import net from "net";
import crypto from "crypto";

import type { ServerConfig, Logger, SmtpSession, SmtpReply } from "../shared/types.js";
import { errorMessage } from "../shared/errors.js";
import type { MailStore } from "../store/index.js";
import { handleLine, type SmtpContext } from "./commands/index.js";
import { formatReply, reply } from "./formatter.js";

// Security limits
const MAX_LINE_SIZE = 64 * 1024; // 64KB max unterminated line

/**
 * Create SMTP session
 */
export function createSession(remoteAddress: string): SmtpSession {
    return {
        id: crypto.randomUUID(),
        remoteAddress,
        state: "connected",
        envelope: { to: [] },
        dataLines: [],
        dataSize: 0,
        dataOverflow: false,
        transactions: 0,
    };
}

/**
 * Create and configure SMTP server
 */
export function createSmtpServer(config: ServerConfig, store: MailStore, logger: Logger): net.Server {
    const context: SmtpContext = { store, logger, config };

    const server = net.createServer((socket) => {
        const session = createSession(socket.remoteAddress || "unknown");
        const peer = `${session.remoteAddress} (${session.id.slice(0, 8)})`;
        logger.debug("smtp", `Connection from ${peer}`);

        const send = (response: SmtpReply): void => {
            if (socket.writable) {
                socket.write(formatReply(response) + "\r\n");
            }
        };

        // Send a last reply and release the socket once it is flushed,
        // whether or not the peer ever closes its side
        const hangUp = (response: SmtpReply | null): void => {
            if (socket.destroyed) return;
            if (socket.writableEnded) {
                socket.destroy();
                return;
            }
            const text = response ? formatReply(response) + "\r\n" : "";
            socket.end(text, () => socket.destroy());
        };

        socket.setEncoding("utf8");
        send(reply(220, `${config.hostname} ESMTP mailsink ready`));

        let buffer = "";
        // Lines are handled one at a time, in arrival order
        let queue: Promise<void> = Promise.resolve();

        const processLine = async (line: string): Promise<void> => {
            if (socket.destroyed || session.state === "closed") {
                return;
            }

            const response = await handleLine(session, line, context);
            // handleLine may have moved the session to "closed"
            const current: SmtpSession = session;
            if (current.state === "closed") {
                hangUp(response);
            } else if (response) {
                send(response);
            }
        };

        socket.on("data", (data: string) => {
            if (socket.writableEnded) return;
            buffer += data;

            let lineEnd;
            while ((lineEnd = buffer.indexOf("\n")) !== -1) {
                const line = buffer.slice(0, lineEnd).replace(/\r$/, "");
                buffer = buffer.slice(lineEnd + 1);
                queue = queue
                    .then(() => processLine(line))
                    .catch((error: unknown) => {
                        logger.error("smtp", `Connection error from ${peer}: ${errorMessage(error)}`);
                        socket.destroy();
                    });
            }

            // Security: Check buffer size to prevent memory exhaustion
            if (buffer.length > MAX_LINE_SIZE) {
                logger.warn("smtp", `Line too long from ${peer}, closing`);
                buffer = "";
                hangUp(reply(500, "Line too long"));
            }
        });

        socket.on("close", () => {
            logger.debug(
                "smtp",
                `Closed ${peer} after ${session.transactions} message(s)`
            );
        });

        socket.on("error", (err) => {
            logger.warn("smtp", `Socket error from ${peer}: ${err.message}`);
        });

        // Inactivity deadline
        socket.setTimeout(config.socketTimeout);
        socket.on("timeout", () => {
            logger.info("smtp", `Timeout ${peer}`);
            hangUp(reply(421, `${config.hostname} Timeout, closing connection`));
        });
    });

    return server;
}
