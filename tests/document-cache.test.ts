import { describe, it, expect, vi, beforeEach } from "vitest";
import { PersistenceError } from "../errors";
import { DocumentCache } from "../scripts/document-cache";
import { emptyDocument } from "../scripts/merge";
import { MemoryBlobStore } from "./fixtures";

const KEY = "dining_info.json";

async function storeWeek(store: MemoryBlobStore, weekOf: string): Promise<void> {
    const document = emptyDocument();
    document.trucks.week_of = weekOf;
    await store.put(KEY, JSON.stringify(document));
}

describe("DocumentCache", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    it("should download the body only when the store has a newer blob", async () => {
        const store = new MemoryBlobStore();
        await storeWeek(store, "Oct. 12");
        const cache = new DocumentCache(store, KEY);
        const get = vi.spyOn(store, "get");

        expect((await cache.get()).document.trucks.week_of).toBe("Oct. 12");
        expect((await cache.get()).document.trucks.week_of).toBe("Oct. 12");
        expect(get).toHaveBeenCalledTimes(1);

        await storeWeek(store, "Oct. 19");
        expect((await cache.get()).document.trucks.week_of).toBe("Oct. 19");
        expect(get).toHaveBeenCalledTimes(2);
    });

    it("should carry the blob's last-modified time", async () => {
        const store = new MemoryBlobStore();
        await storeWeek(store, "Oct. 12");

        const snapshot = await new DocumentCache(store, KEY).get();
        expect(snapshot.lastModified.toISOString()).toBe("2026-01-01T00:00:01.000Z");
    });

    it("should serve the last snapshot when the store becomes unreachable", async () => {
        const store = new MemoryBlobStore();
        await storeWeek(store, "Oct. 12");
        const cache = new DocumentCache(store, KEY);
        await cache.get();

        store.failReads = true;
        expect((await cache.get()).document.trucks.week_of).toBe("Oct. 12");
    });

    it("should keep the last snapshot when a newer blob is malformed", async () => {
        const store = new MemoryBlobStore();
        await storeWeek(store, "Oct. 12");
        const cache = new DocumentCache(store, KEY);
        await cache.get();

        await store.put(KEY, JSON.stringify({ halls: 3 }));
        expect((await cache.get()).document.trucks.week_of).toBe("Oct. 12");
    });

    it("should throw a PersistenceError with nothing stored and nothing cached", async () => {
        await expect(new DocumentCache(new MemoryBlobStore(), KEY).get()).rejects.toBeInstanceOf(PersistenceError);
    });

    it("should throw a PersistenceError when the store fails before any snapshot", async () => {
        const store = new MemoryBlobStore();
        store.failReads = true;
        await expect(new DocumentCache(store, KEY).get()).rejects.toThrow(
            "Failed to fetch dining data: store unreachable"
        );
    });
});
