import { Router } from "express";
import type { DocumentCache } from "../scripts/document-cache";
import type { ItemRecord } from "../types";
import { sendData, sendError, sendReadFailure } from "./respond";

const queryString = (value: unknown): string | undefined => (typeof value === "string" && value ? value : undefined);

export interface ItemSearch {
    q?: string;
    /** Label the item must carry, e.g. "vegan" */
    dietary?: string;
    /** Label the item must not carry, e.g. "peanuts" */
    allergen?: string;
}

export interface ItemSearchResult {
    id: string;
    name: string;
    labels: string[];
    calories: string | null;
}

export function searchItems(items: Record<string, ItemRecord>, search: ItemSearch): ItemSearchResult[] {
    const q = search.q?.toLowerCase();
    const dietary = search.dietary?.toLowerCase();
    const allergen = search.allergen?.toLowerCase();
    const results: ItemSearchResult[] = [];

    for (const [id, item] of Object.entries(items)) {
        if (q && !item.name.toLowerCase().includes(q)) continue;

        const labels = item.kind === "standard" ? item.labels : [];
        const lowered = labels.map((label) => label.toLowerCase());
        if (dietary && !lowered.includes(dietary)) continue;
        if (allergen && lowered.includes(allergen)) continue;

        results.push({
            id,
            name: item.name,
            labels,
            calories: item.kind === "standard" ? item.calories : null,
        });
    }

    return results;
}

/**
 *   GET /items/:itemId
 *   GET /search?q=&dietary=&allergen=
 */
export function createItemsRouter(cache: DocumentCache): Router {
    const router = Router();

    router.get("/items/:itemId", async (req, res) => {
        const { itemId } = req.params;

        try {
            const { document, lastModified } = await cache.get();
            const item = Object.prototype.hasOwnProperty.call(document.items, itemId) ? document.items[itemId] : null;
            if (!item) {
                return sendError(res, 404, "Item not found");
            }

            sendData(res, { id: itemId, ...item, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, `GET /items/${itemId}`);
        }
    });

    router.get("/search", async (req, res) => {
        try {
            const { document, lastModified } = await cache.get();
            const items = searchItems(document.items, {
                q: queryString(req.query.q),
                dietary: queryString(req.query.dietary),
                allergen: queryString(req.query.allergen),
            });

            sendData(res, { items, count: items.length, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, "GET /search");
        }
    });

    return router;
}
