import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { PersistenceError } from "../errors";
import { emptyDocument } from "../scripts/merge";
import { FileBlobStore, SqliteBlobStore, createBlobStore, loadDocument, saveDocument } from "../scripts/store";
import { MemoryBlobStore, SUNDAY_NOON } from "./fixtures";

const KEY = "dining_info.json";

describe("blob store", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    describe("SqliteBlobStore", () => {
        let store: SqliteBlobStore;

        beforeEach(() => {
            store = new SqliteBlobStore(":memory:");
        });

        afterEach(() => {
            store.close();
        });

        it("should return null for a missing key", async () => {
            expect(await store.get(KEY)).toBeNull();
            expect(await store.head(KEY)).toBeNull();
        });

        it("should replace the body on a second put", async () => {
            await store.put(KEY, '{"v":1}');
            await store.put(KEY, '{"v":2}');

            const blob = await store.get(KEY);
            expect(blob?.body).toBe('{"v":2}');
            expect(await store.head(KEY)).toEqual(blob?.lastModified);
        });
    });

    describe("FileBlobStore", () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(path.join(os.tmpdir(), "dining-store-"));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it("should write the body to a file named after the key", async () => {
            const store = new FileBlobStore(path.join(dir, "nested"));
            await store.put(KEY, "{}");

            const blob = await store.get(KEY);
            expect(blob?.body).toBe("{}");
            expect(blob?.lastModified).toBeInstanceOf(Date);
        });

        it("should reject keys that leave the directory", async () => {
            const store = new FileBlobStore(dir);
            await expect(store.get("../secrets.json")).rejects.toBeInstanceOf(PersistenceError);
        });

        it("should be picked by the file driver", () => {
            expect(createBlobStore({ storeDriver: "file", storePath: dir })).toBeInstanceOf(FileBlobStore);
        });
    });

    describe("loadDocument", () => {
        it("should start from the empty skeleton when nothing is stored", async () => {
            expect(await loadDocument(new MemoryBlobStore(), KEY)).toEqual(emptyDocument());
        });

        it("should start from the empty skeleton when the blob is not JSON", async () => {
            const store = new MemoryBlobStore();
            await store.put(KEY, "{not json");
            expect(await loadDocument(store, KEY)).toEqual(emptyDocument());
        });

        it("should start from the empty skeleton when the blob has the wrong shape", async () => {
            const store = new MemoryBlobStore();
            await store.put(KEY, JSON.stringify({ halls: [], trucks: {} }));
            expect(await loadDocument(store, KEY)).toEqual(emptyDocument());
        });

        it("should read back a saved document", async () => {
            const store = new MemoryBlobStore();
            const document = emptyDocument();
            document.trucks.week_of = "Oct. 12";
            document.items["7"] = { kind: "composite", name: "Plate", ingredients: { Sides: ["8"] } };

            await saveDocument(store, KEY, document, SUNDAY_NOON);
            const loaded = await loadDocument(store, KEY);

            expect(loaded).toEqual({ ...document, last_updated: SUNDAY_NOON.toISOString() });
        });

        it("should throw a PersistenceError when the store cannot be read", async () => {
            const store = new MemoryBlobStore();
            store.failReads = true;
            await expect(loadDocument(store, KEY)).rejects.toThrow("Failed to read dining_info.json: store unreachable");
        });

        it("should read a file written by an older run", async () => {
            const dir = mkdtempSync(path.join(os.tmpdir(), "dining-store-"));
            try {
                writeFileSync(path.join(dir, KEY), JSON.stringify({ ...emptyDocument(), last_updated: "2026-10-17T11:00:00.000Z" }));
                const loaded = await loadDocument(new FileBlobStore(dir), KEY);
                expect(loaded.last_updated).toBe("2026-10-17T11:00:00.000Z");
            } finally {
                rmSync(dir, { recursive: true, force: true });
            }
        });
    });

    describe("saveDocument", () => {
        it("should stamp last_updated and write indented JSON", async () => {
            const store = new MemoryBlobStore();
            const document = emptyDocument();

            await saveDocument(store, KEY, document, SUNDAY_NOON);

            expect(document.last_updated).toBe(SUNDAY_NOON.toISOString());
            expect(store.bodyOf(KEY)).toBe(JSON.stringify(document, null, 4));
        });

        it("should wrap write failures in a PersistenceError", async () => {
            const store = new MemoryBlobStore();
            store.failWrites = true;
            await expect(saveDocument(store, KEY, emptyDocument(), SUNDAY_NOON)).rejects.toBeInstanceOf(PersistenceError);
        });
    });
});
