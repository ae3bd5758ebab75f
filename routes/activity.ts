import { Router } from "express";
import type { ActivityReader } from "../collectors/activity";
import { errorMessage } from "../errors";
import { sendData, sendError } from "./respond";

/**
 *   GET /activity
 *   GET /activity/:locationId
 *
 * Read live on every request; occupancy is never cached or stored.
 */
export function createActivityRouter(reader: ActivityReader): Router {
    const router = Router();

    router.get("/activity", async (req, res) => {
        try {
            sendData(res, await reader.readAll());
        } catch (error) {
            console.error("[Activity] Error fetching activity data:", errorMessage(error));
            sendError(res, 500, "Error fetching activity data");
        }
    });

    router.get("/activity/:locationId", async (req, res) => {
        const { locationId } = req.params;
        if (!reader.hasLocation(locationId)) {
            return sendError(res, 404, "Invalid location ID");
        }

        try {
            sendData(res, { [locationId]: await reader.read(locationId) });
        } catch (error) {
            console.error(`[Activity] Error fetching activity for ${locationId}:`, errorMessage(error));
            sendError(res, 502, "Error fetching activity data");
        }
    });

    return router;
}
