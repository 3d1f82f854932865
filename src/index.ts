/**
 * mailsink - local mail capture for development and testing
 *
 * Accepts mail over SMTP, stores every message in a local database and serves
 * a small query API to list, read and delete captured messages.
 */

// Load .env file before anything else
import "dotenv/config";

import type net from "net";

import { loadConfig, createLogger, generateApiKey, SERVER_NAME } from "./shared/config.js";
import { MailStore } from "./store/index.js";
import { createSmtpServer } from "./smtp/server.js";
import { createHttpServer } from "./http/server.js";

// Load configuration
const config = loadConfig();
const logger = createLogger(config.logLevel);

if (!config.apiKey) {
    config.apiKey = generateApiKey();
    logger.warn("main", "API_KEY not set, generated a key for this run");
}

// Open the mail store
const store = new MailStore({ dbPath: config.dbPath });
logger.info("main", `Mail store opened at ${config.dbPath} (${store.count()} mails)`);

const smtpServer = createSmtpServer(config, store, logger);
const httpServer = createHttpServer(config, store, logger);

smtpServer.listen(config.smtpPort, config.smtpHost, () => {
    logger.info("smtp", `Listening on ${config.smtpHost}:${config.smtpPort}`);
});

httpServer.listen(config.httpPort, config.httpHost, () => {
    logger.info("http", `Listening on ${config.httpHost}:${config.httpPort}`);
    console.log(`
${SERVER_NAME} is capturing mail

  SMTP:  ${config.smtpHost}:${config.smtpPort}
  API:   http://${config.httpHost}:${config.httpPort}/mails?k=${config.apiKey}
  Store: ${config.dbPath}
`);
});

for (const [name, server] of [["smtp", smtpServer], ["http", httpServer]] as const) {
    server.on("error", (error) => {
        logger.error(name, `Server error: ${error.message}`);
        process.exit(1);
    });
}

function closeServer(server: net.Server): Promise<void> {
    return new Promise((resolve) => server.close(() => resolve()));
}

// Graceful shutdown
function shutdown(signal: string) {
    logger.info("main", `Received ${signal}, closing servers...`);

    Promise.all([closeServer(smtpServer), closeServer(httpServer)])
        .then(() => {
            store.close();
            logger.info("main", "Servers closed");
            process.exit(0);
        })
        .catch((error: unknown) => {
            logger.error("main", `Shutdown failed: ${error}`);
            process.exit(1);
        });

    // Force exit after 10 seconds
    setTimeout(() => {
        logger.warn("main", "Forcing exit after timeout");
        process.exit(1);
    }, 10000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
