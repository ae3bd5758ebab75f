import { Router } from "express";
import type { CollectionTracker } from "../scripts/collection-status";

/**
 * GET /collect-status
 * Returns the state of the current or most recent collection
 */
export function createCollectStatusRouter(tracker: CollectionTracker): Router {
    const router = Router();

    router.get("/collect-status", (req, res) => {
        res.json(tracker.status());
    });

    return router;
}
