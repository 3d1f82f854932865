/**
 * SQLite-backed Mail Store
 * Durable, key-ordered map from mail id to encoded mail record
 *
 * better-sqlite3 is synchronous: every call below runs to completion on the
 * event loop thread, so store operations are totally ordered. An iteration
 * consumed inside one synchronous call sees a consistent snapshot.
 */

import Database from "better-sqlite3";
import path from "path";
import fs from "fs";

import type { Mail } from "../shared/types.js";
import { MailSinkError, ErrorCodes } from "../shared/errors.js";
import { encodeMail, decodeMail } from "./codec.js";

export interface MailStoreOptions {
    /** Path to the database file, or ":memory:" */
    dbPath?: string;
    /** Use an already opened database instead of opening dbPath */
    database?: Database.Database;
}

/**
 * Stored entry with lazy decoding: entries skipped by pagination are never decoded
 */
export interface MailEntry {
    id: string;
    decode(): Mail;
}

interface MailRow {
    id: string;
    value: Buffer;
}

export class MailStore {
    private db: Database.Database;

    constructor(options: MailStoreOptions = {}) {
        if (options.database) {
            this.db = options.database;
        } else {
            const dbPath = options.dbPath ?? path.join(process.cwd(), ".data", "mails.db");

            if (dbPath !== ":memory:") {
                // Ensure data directory exists
                const dataDir = path.dirname(dbPath);
                if (!fs.existsSync(dataDir)) {
                    fs.mkdirSync(dataDir, { recursive: true });
                }
            }

            this.db = new Database(dbPath);
            this.db.pragma("journal_mode = WAL");
            this.db.pragma("synchronous = NORMAL");
        }

        // BINARY collation keeps byte-wise key order
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS mails (
                id TEXT PRIMARY KEY COLLATE BINARY,
                value BLOB NOT NULL,
                size INTEGER NOT NULL
            );
        `);

        this.stmtGet = this.db.prepare<[string], MailRow>("SELECT id, value FROM mails WHERE id = ?");
        this.stmtPut = this.db.prepare<[string, Buffer, number]>(
            "INSERT OR REPLACE INTO mails (id, value, size) VALUES (?, ?, ?)"
        );
        this.stmtDelete = this.db.prepare<[string]>("DELETE FROM mails WHERE id = ?");
        this.stmtClear = this.db.prepare<[]>("DELETE FROM mails");
        this.stmtIterate = this.db.prepare<[number], MailRow>(
            "SELECT id, value FROM mails ORDER BY id ASC LIMIT -1 OFFSET ?"
        );
        this.stmtStats = this.db.prepare<[], { count: number; size: number | null }>(
            "SELECT COUNT(*) as count, SUM(size) as size FROM mails"
        );
    }

    private stmtGet: Database.Statement<[string], MailRow>;
    private stmtPut: Database.Statement<[string, Buffer, number]>;
    private stmtDelete: Database.Statement<[string]>;
    private stmtClear: Database.Statement<[]>;
    private stmtIterate: Database.Statement<[number], MailRow>;
    private stmtStats: Database.Statement<[], { count: number; size: number | null }>;

    /**
     * Store a mail under its id, replacing any previous record
     */
    put(id: string, mail: Mail): void {
        const value = encodeMail(mail);
        this.guard("put", () => this.stmtPut.run(id, value, value.length));
    }

    /**
     * Get a mail by id
     * @throws MailSinkError with DECODE_ERROR when the stored record is corrupt
     */
    get(id: string): Mail | null {
        const row = this.guard("get", () => this.stmtGet.get(id));
        if (!row) return null;
        return decodeMail(row.id, row.value);
    }

    /**
     * Delete a mail
     * @returns whether a record was removed
     */
    delete(id: string): boolean {
        const result = this.guard("delete", () => this.stmtDelete.run(id));
        return result.changes > 0;
    }

    /**
     * Delete every mail
     * @returns number of records removed
     */
    clear(): number {
        return this.guard("clear", () => this.stmtClear.run()).changes;
    }

    /**
     * Entries in ascending key order, starting after `offset` entries
     */
    *iterate(offset = 0): Generator<MailEntry> {
        const rows = this.guard("iterate", () => this.stmtIterate.iterate(offset));
        for (const row of rows) {
            yield {
                id: row.id,
                decode: () => decodeMail(row.id, row.value),
            };
        }
    }

    /**
     * Number of stored mails
     */
    count(): number {
        return this.stats().mails;
    }

    /**
     * Get store stats
     */
    stats(): { mails: number; size: number } {
        const row = this.guard("stats", () => this.stmtStats.get());
        return {
            mails: row?.count ?? 0,
            size: row?.size ?? 0,
        };
    }

    /**
     * Close the database
     */
    close(): void {
        this.db.close();
    }

    /**
     * Run a statement, wrapping engine failures as STORE_IO
     */
    private guard<T>(operation: string, run: () => T): T {
        try {
            return run();
        } catch (error) {
            throw new MailSinkError(`Store ${operation} failed`, ErrorCodes.STORE_IO, {
                originalError: error,
            });
        }
    }
}
