import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { ActivityReader } from "./collectors/activity";
import { errorMessage } from "./errors";
import { createActivityRouter } from "./routes/activity";
import { createCollectStatusRouter } from "./routes/collect-status";
import { createDocumentRouter } from "./routes/document";
import { createHallsRouter } from "./routes/halls";
import { createHealthRouter } from "./routes/health";
import { createItemsRouter } from "./routes/items";
import { sendError } from "./routes/respond";
import type { CollectionTracker } from "./scripts/collection-status";
import type { DocumentCache } from "./scripts/document-cache";
import type { DiningSources } from "./types";

export interface AppDependencies {
    cache: DocumentCache;
    sources: DiningSources;
    activity: ActivityReader;
    tracker: CollectionTracker;
    clock?: () => Date;
}

export function createApp({ cache, sources, activity, tracker, clock }: AppDependencies): express.Express {
    const app = express();

    app.use(cors());

    app.get("/", (req, res) => {
        res.send("Welcome to the Campus Dining API!");
    });

    app.use(createHealthRouter(cache));

    app.use(createDocumentRouter(cache));

    app.use(createHallsRouter(cache, sources, clock));

    app.use(createItemsRouter(cache));

    app.use(createActivityRouter(activity));

    app.use(createCollectStatusRouter(tracker));

    app.use((req, res) => {
        sendError(res, 404, `No route for ${req.method} ${req.path}`);
    });

    // Express recognises error handlers by their four parameters
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        console.error(`Unhandled error on ${req.method} ${req.path}:`, errorMessage(error));
        sendError(res, 500, "Internal server error");
    });

    return app;
}
