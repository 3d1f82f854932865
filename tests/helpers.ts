import net from "net";
import { vi } from "vitest";

import type { Logger, Mail, ServerConfig } from "../src/shared/types.js";
import { loadConfig } from "../src/shared/config.js";

export const TEST_SECRET = "test-secret";

/**
 * Logger whose calls can be asserted on
 */
export function createTestLogger(): Logger {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): ServerConfig {
    return loadConfig({ API_KEY: TEST_SECRET, DB_PATH: ":memory:", ...env });
}

export function makeMail(id: string, overrides: Partial<Mail> = {}): Mail {
    return {
        id,
        from: "sender@example.test",
        to: ["rcpt@example.test"],
        subject: `Subject ${id}`,
        body: `Body of ${id}`,
        receivedAt: new Date("2026-01-02T03:04:05.678Z"),
        ...overrides,
    };
}

/**
 * Listen on an ephemeral loopback port
 */
export function listen(server: net.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address === null || typeof address === "string") {
                reject(new Error("Server has no TCP address"));
                return;
            }
            resolve(address.port);
        });
    });
}

export function close(server: net.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
