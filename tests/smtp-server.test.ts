import net from "net";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { MailStore } from "../src/store/index.js";
import { createSmtpServer } from "../src/smtp/server.js";
import { close, createTestLogger, listen, testConfig } from "./helpers.js";

function connectionCount(server: net.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.getConnections((error, count) => (error ? reject(error) : resolve(count)));
    });
}

async function waitForConnections(server: net.Server, expected: number): Promise<number> {
    let count = await connectionCount(server);
    for (let attempt = 0; attempt < 50 && count !== expected; attempt++) {
        await new Promise((resolve) => setTimeout(resolve, 20));
        count = await connectionCount(server);
    }
    return count;
}

// A reply is complete once its last line ("code SP text") has arrived
const REPLY_END = /(?:^|\r\n)\d{3} [^\r\n]*\r\n$/;

class SmtpTestClient {
    private socket: net.Socket;
    private buffer = "";
    private waiters: Array<() => void> = [];
    readonly closed: Promise<void>;

    constructor(port: number) {
        this.socket = net.connect(port, "127.0.0.1");
        this.socket.setEncoding("utf8");
        this.socket.on("data", (data: string) => {
            this.buffer += data;
            this.waiters.splice(0).forEach((wake) => wake());
        });
        this.socket.on("error", () => this.socket.destroy());
        this.closed = new Promise((resolve) => this.socket.on("close", () => resolve()));
    }

    /**
     * Wait for the next complete reply
     */
    async reply(): Promise<string> {
        while (!REPLY_END.test(this.buffer)) {
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }
        const received = this.buffer;
        this.buffer = "";
        return received;
    }

    async command(line: string): Promise<string> {
        this.socket.write(`${line}\r\n`);
        return this.reply();
    }

    write(data: string): void {
        this.socket.write(data);
    }

    destroy(): void {
        this.socket.destroy();
    }
}

describe("SMTP server", () => {
    let store: MailStore;
    let server: net.Server;
    let port: number;

    async function start(env: NodeJS.ProcessEnv = {}): Promise<void> {
        server = createSmtpServer(testConfig({ SOCKET_TIMEOUT: "2000", ...env }), store, createTestLogger());
        port = await listen(server);
    }

    beforeEach(() => {
        store = new MailStore({ dbPath: ":memory:" });
    });

    afterEach(async () => {
        await close(server);
        store.close();
    });

    it("ingests a message over a connection", async () => {
        await start();
        const client = new SmtpTestClient(port);

        expect(await client.reply()).toBe("220 localhost ESMTP mailsink ready\r\n");
        expect(await client.command("EHLO client.test")).toBe(
            "250-localhost Hello client.test\r\n250-SIZE 10485760\r\n250 8BITMIME\r\n"
        );
        expect(await client.command("MAIL FROM:<a@x>")).toBe("250 OK\r\n");
        expect(await client.command("RCPT TO:<b@y>")).toBe("250 OK\r\n");
        expect(await client.command("DATA")).toBe("354 End data with <CR><LF>.<CR><LF>\r\n");

        client.write("Subject: Hi\r\n\r\nhello\r\n.\r\n");
        const queued = await client.reply();

        const [entry] = [...store.iterate()];
        expect(queued).toBe(`250 OK: queued as ${entry.id}\r\n`);
        expect(entry.decode()).toMatchObject({ from: "a@x", to: ["b@y"], subject: "Hi", body: "hello" });

        expect(await client.command("QUIT")).toBe("221 localhost closing connection\r\n");
        await client.closed;
    });

    it("keeps the connection open after a rejected command", async () => {
        await start();
        const client = new SmtpTestClient(port);
        await client.reply();

        expect(await client.command("BOGUS")).toBe("500 Command not recognized: BOGUS\r\n");
        expect(await client.command("DATA")).toBe("503 Bad sequence of commands: send HELO/EHLO first\r\n");
        expect(await client.command("NOOP")).toBe("250 OK\r\n");

        await client.command("QUIT");
        await client.closed;
    });

    it("handles commands pipelined in one write", async () => {
        await start();
        const client = new SmtpTestClient(port);
        await client.reply();

        client.write("HELO client.test\r\nMAIL FROM:<a@x>\r\nRCPT TO:<b@y>\r\n");
        // Three replies may arrive together
        let received = "";
        while (received.split("\r\n").length < 4) {
            received += await client.reply();
        }
        expect(received).toBe("250 localhost Hello client.test\r\n250 OK\r\n250 OK\r\n");

        client.destroy();
        await client.closed;
    });

    it("isolates a dropped connection from the others", async () => {
        await start();
        const dropped = new SmtpTestClient(port);
        const kept = new SmtpTestClient(port);
        await dropped.reply();
        await kept.reply();

        for (const line of ["HELO one.test", "MAIL FROM:<a@x>", "RCPT TO:<b@y>", "DATA"]) {
            await dropped.command(line);
        }
        dropped.write("partial line\r\n");
        dropped.destroy();
        await dropped.closed;

        for (const line of ["HELO two.test", "MAIL FROM:<c@z>", "RCPT TO:<d@w>", "DATA"]) {
            await kept.command(line);
        }
        expect(await kept.command("complete\r\n.")).toMatch(/^250 OK: queued as [0-9a-f]{24}\r\n$/);
        await kept.command("QUIT");
        await kept.closed;

        const mails = [...store.iterate()].map((entry) => entry.decode());
        expect(mails).toHaveLength(1);
        expect(mails[0].from).toBe("c@z");
    });

    it("rejects an overlong line and closes", async () => {
        await start();
        const client = new SmtpTestClient(port);
        await client.reply();

        client.write("x".repeat(64 * 1024 + 1));
        expect(await client.reply()).toBe("500 Line too long\r\n");
        await client.closed;
    });

    it("releases an idle connection even when the peer never closes its side", async () => {
        await start({ SOCKET_TIMEOUT: "100" });
        const socket = net.connect({ port, host: "127.0.0.1", allowHalfOpen: true });
        socket.setEncoding("utf8");
        let received = "";
        socket.on("data", (data: string) => {
            received += data;
        });
        await new Promise<void>((resolve) => socket.on("end", () => resolve()));

        expect(received).toBe("220 localhost ESMTP mailsink ready\r\n421 localhost Timeout, closing connection\r\n");
        expect(await waitForConnections(server, 0)).toBe(0);
        socket.destroy();
    });

    it("closes idle connections with 421", async () => {
        await start({ SOCKET_TIMEOUT: "100" });
        const client = new SmtpTestClient(port);
        await client.reply();

        expect(await client.reply()).toBe("421 localhost Timeout, closing connection\r\n");
        await client.closed;
    });
});
