/**
 * Query API Server
 * One request line per connection, one response, then close
 */
import net from "net";

import type { ServerConfig, Logger, HttpRequest, HttpResponse } from "../shared/types.js";
import { toHttpStatus, errorMessage } from "../shared/errors.js";
import type { MailStore } from "../store/index.js";
import { parseRequestLine } from "./parser.js";
import { checkAccess } from "./gate.js";
import type { Router } from "./router.js";
import { emptyResponse, formatResponse } from "./formatter.js";
import { buildRoutes, type RouteContext } from "./routes/index.js";

// Security limits
const MAX_LINE_SIZE = 64 * 1024; // 64KB max request line

export interface HttpContext extends RouteContext {
    router: Router<RouteContext>;
    apiKey: string;
}

export function createHttpContext(
    config: ServerConfig,
    store: MailStore,
    logger: Logger,
    startedAt: Date = new Date()
): HttpContext {
    return {
        router: buildRoutes(),
        apiKey: config.apiKey,
        store,
        logger,
        listDecodePolicy: config.listDecodePolicy,
        startedAt,
    };
}

/**
 * Run one request line through the gate, the router and a handler
 * @returns the response, or null when the connection must close without one
 */
export function processRequestLine(line: string, context: HttpContext): HttpResponse | null {
    const { logger } = context;
    const parsed = parseRequestLine(line);

    if (parsed.kind === "malformed") {
        logger.debug("http", "Malformed request line");
        return emptyResponse(400);
    }

    if (parsed.kind === "unknown_method") {
        logger.debug("http", `Unsupported method ${parsed.method}, closing`);
        return null;
    }

    // Missing and wrong keys look the same to the client
    if (!checkAccess(parsed.query, context.apiKey)) {
        logger.debug("http", `Rejected ${parsed.method} ${parsed.path}: bad access key`);
        return null;
    }

    let response: HttpResponse;
    try {
        const match = context.router.match(parsed.method, parsed.path);
        if (!match) {
            response = emptyResponse(404);
        } else {
            const request: HttpRequest = {
                method: parsed.method,
                path: parsed.path,
                query: parsed.query,
                params: match.params,
            };
            response = match.route.handler(request, context);
        }
    } catch (error) {
        const status = toHttpStatus(error);
        if (status === 500) {
            logger.error("http", `${parsed.method} ${parsed.path} failed: ${errorMessage(error)}`);
        }
        response = emptyResponse(status);
    }

    logger.info("http", `${parsed.method} ${parsed.path} ${response.status}`);
    return response;
}

/**
 * Create and configure the query API server
 */
export function createHttpServer(config: ServerConfig, store: MailStore, logger: Logger): net.Server {
    const context = createHttpContext(config, store, logger);

    // Half-open sockets: a peer may close its side right after the request line
    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
        const remoteAddress = socket.remoteAddress || "unknown";
        let buffer = "";
        let handled = false;

        const respond = (line: string): void => {
            handled = true;
            const response = processRequestLine(line, context);
            if (response) {
                socket.end(formatResponse(response));
            } else {
                socket.end();
            }
        };

        socket.setEncoding("utf8");

        socket.on("data", (data: string) => {
            if (handled) return;
            buffer += data;

            const lineEnd = buffer.indexOf("\n");
            if (lineEnd !== -1) {
                respond(buffer.slice(0, lineEnd));
                return;
            }

            // Security: Check buffer size to prevent memory exhaustion
            if (buffer.length > MAX_LINE_SIZE) {
                logger.warn("http", `Request line too long from ${remoteAddress}, closing`);
                handled = true;
                socket.end(formatResponse(emptyResponse(400)));
            }
        });

        socket.on("end", () => {
            if (handled) return;
            if (buffer.length > 0) {
                respond(buffer);
            } else {
                handled = true;
                socket.end();
            }
        });

        socket.on("error", (err) => {
            logger.warn("http", `Socket error from ${remoteAddress}: ${err.message}`);
        });

        // Inactivity deadline
        socket.setTimeout(config.socketTimeout);
        socket.on("timeout", () => {
            logger.debug("http", `Timeout ${remoteAddress}`);
            socket.destroy();
        });
    });

    return server;
}
