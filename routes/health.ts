import { Router } from "express";
import { errorMessage } from "../errors";
import type { DocumentCache } from "../scripts/document-cache";

interface StoreCheck {
    status: "healthy" | "unhealthy";
    lastUpdated?: string;
    responseTime: number;
    error?: string;
}

const checkStore = async (cache: DocumentCache): Promise<StoreCheck> => {
    const startTime = Date.now();

    try {
        const { lastModified } = await cache.get();
        return {
            status: "healthy",
            lastUpdated: lastModified.toISOString(),
            responseTime: Date.now() - startTime,
        };
    } catch (error) {
        return {
            status: "unhealthy",
            responseTime: Date.now() - startTime,
            error: errorMessage(error),
        };
    }
};

/**
 * GET /health
 * Server status plus whether dining data can be served
 */
export function createHealthRouter(cache: DocumentCache): Router {
    const router = Router();

    router.get("/health", async (req, res) => {
        const store = await checkStore(cache);

        const healthStatus = {
            server: {
                status: "healthy",
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
            },
            store,
            overall: store.status === "healthy" ? "healthy" : "degraded",
        };

        res.status(healthStatus.overall === "healthy" ? 200 : 503).json(healthStatus);
    });

    return router;
}
