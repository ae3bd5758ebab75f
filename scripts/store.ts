/**
 * Blob Store
 *
 * The canonical document lives as one JSON blob under a single key. Two
 * drivers: SQLite (default, one `blobs` table) and a plain directory of files.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { mkdir, readFile, rename, stat, writeFile } from "fs/promises";
import path from "path";
import type { AppConfig } from "../config";
import { errorMessage, PersistenceError } from "../errors";
import { parseCanonicalDocument } from "../schema";
import type { CanonicalDocument } from "../types";
import { emptyDocument } from "./merge";

export interface StoredBlob {
    body: string;
    lastModified: Date;
}

export interface BlobStore {
    get(key: string): Promise<StoredBlob | null>;
    /** Last-modified time without reading the body; null when the key is absent */
    head(key: string): Promise<Date | null>;
    put(key: string, body: string, contentType?: string): Promise<void>;
}

interface BlobRow {
    body: string;
    last_modified: string;
}

export class SqliteBlobStore implements BlobStore {
    private readonly db: Database.Database;

    constructor(filename: string) {
        if (filename !== ":memory:") {
            const dir = path.dirname(filename);
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
            }
        }

        this.db = new Database(filename);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS blobs (
                key             TEXT PRIMARY KEY,
                body            TEXT NOT NULL,
                content_type    TEXT NOT NULL,
                last_modified   TEXT NOT NULL
            );
        `);
    }

    async get(key: string): Promise<StoredBlob | null> {
        const row = this.db.prepare(`SELECT body, last_modified FROM blobs WHERE key = ?`).get(key) as
            | BlobRow
            | undefined;

        return row ? { body: row.body, lastModified: new Date(row.last_modified) } : null;
    }

    async head(key: string): Promise<Date | null> {
        const row = this.db.prepare(`SELECT last_modified FROM blobs WHERE key = ?`).get(key) as
            | { last_modified: string }
            | undefined;

        return row ? new Date(row.last_modified) : null;
    }

    async put(key: string, body: string, contentType = "application/json"): Promise<void> {
        this.db
            .prepare(
                `INSERT INTO blobs (key, body, content_type, last_modified) VALUES (?, ?, ?, ?)
                 ON CONFLICT(key) DO UPDATE SET
                    body = excluded.body,
                    content_type = excluded.content_type,
                    last_modified = excluded.last_modified`
            )
            .run(key, body, contentType, new Date().toISOString());
    }

    close(): void {
        this.db.close();
    }
}

export class FileBlobStore implements BlobStore {
    constructor(private readonly dir: string) {}

    private pathFor(key: string): string {
        if (!/^[\w.-]+$/.test(key) || key.startsWith(".")) {
            throw new PersistenceError(`Invalid blob key "${key}"`);
        }
        return path.join(this.dir, key);
    }

    async get(key: string): Promise<StoredBlob | null> {
        const filePath = this.pathFor(key);
        if (!existsSync(filePath)) return null;

        const [body, info] = await Promise.all([readFile(filePath, "utf8"), stat(filePath)]);
        return { body, lastModified: info.mtime };
    }

    async head(key: string): Promise<Date | null> {
        const filePath = this.pathFor(key);
        if (!existsSync(filePath)) return null;
        return (await stat(filePath)).mtime;
    }

    async put(key: string, body: string): Promise<void> {
        const filePath = this.pathFor(key);
        await mkdir(this.dir, { recursive: true });

        // Write beside the target and rename so readers never see half a document
        const tempPath = `${filePath}.${process.pid}.tmp`;
        await writeFile(tempPath, body, "utf8");
        await rename(tempPath, filePath);
    }
}

export function createBlobStore(config: Pick<AppConfig, "storeDriver" | "storePath">): BlobStore {
    return config.storeDriver === "file"
        ? new FileBlobStore(config.storePath)
        : new SqliteBlobStore(config.storePath);
}

/**
 * Read the canonical document for a collection run. A missing or malformed
 * blob yields an empty skeleton; an unreachable store is a PersistenceError.
 */
export async function loadDocument(store: BlobStore, key: string): Promise<CanonicalDocument> {
    let blob: StoredBlob | null;
    try {
        blob = await store.get(key);
    } catch (error) {
        throw new PersistenceError(`Failed to read ${key}: ${errorMessage(error)}`, { cause: error });
    }

    if (!blob) {
        console.log(`[Store] No document under ${key}, starting from an empty one`);
        return emptyDocument();
    }

    let raw: unknown;
    try {
        raw = JSON.parse(blob.body);
    } catch (error) {
        console.warn(`[Store] ${key} is not valid JSON (${errorMessage(error)}), starting from an empty one`);
        return emptyDocument();
    }

    const parsed = parseCanonicalDocument(raw);
    if (!parsed.document) {
        console.warn(`[Store] ${key} does not match the document shape (${parsed.reason}), starting from an empty one`);
        return emptyDocument();
    }

    return parsed.document;
}

/**
 * Stamp `last_updated` and write the whole document in one put.
 */
export async function saveDocument(
    store: BlobStore,
    key: string,
    document: CanonicalDocument,
    now: Date
): Promise<void> {
    document.last_updated = now.toISOString();
    try {
        await store.put(key, JSON.stringify(document, null, 4), "application/json");
    } catch (error) {
        throw new PersistenceError(`Failed to write ${key}: ${errorMessage(error)}`, { cause: error });
    }
    console.log(`[Store] Saved ${key}`);
}
