import { errorMessage, PersistenceError } from "../errors";
import { parseCanonicalDocument } from "../schema";
import type { CanonicalDocument } from "../types";
import type { BlobStore } from "./store";

export interface DocumentSnapshot {
    document: CanonicalDocument;
    lastModified: Date;
}

/**
 * In-memory copy of the canonical document for the API.
 *
 * Each read asks the store for the blob's last-modified time and only
 * downloads the body when it is newer than the cached copy. When the store
 * cannot be reached the last good snapshot is served instead.
 */
export class DocumentCache {
    private snapshot: DocumentSnapshot | null = null;

    constructor(
        private readonly store: BlobStore,
        private readonly key: string
    ) {}

    async get(): Promise<DocumentSnapshot> {
        try {
            const lastModified = await this.store.head(this.key);
            if (!lastModified) {
                throw new PersistenceError(`No dining data stored under ${this.key}`);
            }

            if (this.snapshot && lastModified.getTime() <= this.snapshot.lastModified.getTime()) {
                return this.snapshot;
            }

            console.log("[Cache] Cache is stale or empty, reading dining data from the store");
            const blob = await this.store.get(this.key);
            if (!blob) {
                throw new PersistenceError(`No dining data stored under ${this.key}`);
            }

            const parsed = parseCanonicalDocument(JSON.parse(blob.body));
            if (!parsed.document) {
                throw new PersistenceError(`Stored dining data is malformed: ${parsed.reason}`);
            }

            this.snapshot = { document: parsed.document, lastModified: blob.lastModified };
            return this.snapshot;
        } catch (error) {
            if (this.snapshot) {
                console.warn(`[Cache] Falling back to cached snapshot: ${errorMessage(error)}`);
                return this.snapshot;
            }
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to fetch dining data: ${errorMessage(error)}`, { cause: error });
        }
    }
}
