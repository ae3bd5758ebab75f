import { Router } from "express";
import type { DocumentCache } from "../scripts/document-cache";
import { sendData, sendReadFailure } from "./respond";

/**
 *   GET /trucks
 *   GET /data   (the whole document)
 */
export function createDocumentRouter(cache: DocumentCache): Router {
    const router = Router();

    router.get("/trucks", async (req, res) => {
        try {
            const { document, lastModified } = await cache.get();
            sendData(res, { trucks: document.trucks, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, "GET /trucks");
        }
    });

    router.get("/data", async (req, res) => {
        try {
            const { document } = await cache.get();
            sendData(res, document);
        } catch (error) {
            sendReadFailure(res, error, "GET /data");
        }
    });

    return router;
}
