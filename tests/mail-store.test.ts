import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { MailStore, decodeMail, encodeMail, toMailJson } from "../src/store/index.js";
import { MailSinkError, ErrorCodes } from "../src/shared/errors.js";
import { makeMail } from "./helpers.js";

function insertRaw(database: Database.Database, id: string, value: Buffer): void {
    database.prepare("INSERT INTO mails (id, value, size) VALUES (?, ?, ?)").run(id, value, value.length);
}

function errorCode(run: () => unknown): string | null {
    try {
        run();
    } catch (error) {
        return error instanceof MailSinkError ? error.code : "not a MailSinkError";
    }
    return null;
}

describe("MailStore", () => {
    let store: MailStore;

    beforeEach(() => {
        store = new MailStore({ dbPath: ":memory:" });
    });

    afterEach(() => {
        store.close();
    });

    it("returns what was put", () => {
        const mail = makeMail("m1", { to: ["a@x", "b@y"], subject: "Hi" });
        store.put(mail.id, mail);

        expect(store.get("m1")).toEqual(mail);
    });

    it("returns null for an absent id", () => {
        expect(store.get("missing")).toBeNull();
    });

    it("replaces the record on a second put", () => {
        store.put("m1", makeMail("m1"));
        store.put("m1", makeMail("m1", { body: "second" }));

        expect(store.count()).toBe(1);
        expect(store.get("m1")?.body).toBe("second");
    });

    it("deletes a record", () => {
        store.put("m1", makeMail("m1"));

        expect(store.delete("m1")).toBe(true);
        expect(store.get("m1")).toBeNull();
        expect(store.delete("m1")).toBe(false);
    });

    it("iterates in ascending key order", () => {
        for (const id of ["m3", "m1", "m2"]) {
            store.put(id, makeMail(id));
        }

        expect([...store.iterate()].map((entry) => entry.id)).toEqual(["m1", "m2", "m3"]);
        expect([...store.iterate(1)].map((entry) => entry.id)).toEqual(["m2", "m3"]);
        expect([...store.iterate(5)]).toEqual([]);
    });

    it("orders keys byte-wise", () => {
        for (const id of ["m2", "m10", "M9"]) {
            store.put(id, makeMail(id));
        }

        expect([...store.iterate()].map((entry) => entry.id)).toEqual(["M9", "m10", "m2"]);
    });

    it("decodes entries on demand", () => {
        store.put("m1", makeMail("m1"));

        const [entry] = [...store.iterate()];
        expect(entry.decode()).toEqual(makeMail("m1"));
    });

    it("clears every record", () => {
        store.put("m1", makeMail("m1"));
        store.put("m2", makeMail("m2"));

        expect(store.clear()).toBe(2);
        expect(store.count()).toBe(0);
        expect(store.clear()).toBe(0);
    });

    it("reports stats", () => {
        const mail = makeMail("m1");
        store.put("m1", mail);

        expect(store.stats()).toEqual({ mails: 1, size: encodeMail(mail).length });
    });

    it("wraps engine failures as STORE_IO", () => {
        const closed = new MailStore({ dbPath: ":memory:" });
        closed.close();

        expect(errorCode(() => closed.get("m1"))).toBe(ErrorCodes.STORE_IO);
        expect(errorCode(() => closed.put("m1", makeMail("m1")))).toBe(ErrorCodes.STORE_IO);
    });
});

describe("MailStore with corrupt records", () => {
    let database: Database.Database;
    let store: MailStore;

    beforeEach(() => {
        database = new Database(":memory:");
        store = new MailStore({ database });
    });

    afterEach(() => {
        store.close();
    });

    it("raises DECODE_ERROR on get", () => {
        insertRaw(database, "bad", Buffer.from("not json"));

        expect(errorCode(() => store.get("bad"))).toBe(ErrorCodes.DECODE_ERROR);
    });

    it("only decodes entries that are asked for", () => {
        insertRaw(database, "a", Buffer.from("{}"));
        store.put("b", makeMail("b"));

        const entries = [...store.iterate()];
        expect(entries.map((entry) => entry.id)).toEqual(["a", "b"]);
        expect(entries[1].decode().id).toBe("b");
        expect(errorCode(() => entries[0].decode())).toBe(ErrorCodes.DECODE_ERROR);
    });
});

describe("MailStore on disk", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "mailsink-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("keeps records across a reopen", () => {
        const dbPath = path.join(dir, "nested", "mails.db");
        const mail = makeMail("m1");

        const first = new MailStore({ dbPath });
        first.put(mail.id, mail);
        first.close();

        const second = new MailStore({ dbPath });
        expect(second.get("m1")).toEqual(mail);
        second.close();
    });
});

describe("mail codec", () => {
    it("rejects records of another version", () => {
        const value = Buffer.from(
            JSON.stringify({ v: 2, id: "m1", from: "", to: [], subject: "", body: "", receivedAt: 0 })
        );

        expect(errorCode(() => decodeMail("m1", value))).toBe(ErrorCodes.DECODE_ERROR);
    });

    it("restores the receipt time", () => {
        const mail = makeMail("m1");
        expect(decodeMail("m1", encodeMail(mail)).receivedAt.getTime()).toBe(mail.receivedAt.getTime());
    });

    it("renders received_at as ISO 8601", () => {
        expect(toMailJson(makeMail("m1"))).toEqual({
            id: "m1",
            from: "sender@example.test",
            to: ["rcpt@example.test"],
            subject: "Subject m1",
            body: "Body of m1",
            received_at: "2026-01-02T03:04:05.678Z",
        });
    });
});
