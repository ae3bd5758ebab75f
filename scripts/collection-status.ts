import { errorMessage } from "../errors";
import type { CollectionReport, DiningCollector } from "./collect-core";

export interface CollectionStatus {
    status: "idle" | "running" | "completed" | "failed";
    startedAt: string | null;
    completedAt: string | null;
    report: CollectionReport | null;
    error: string | null;
}

/**
 * Keeps at most one collection running per process and remembers how the
 * last one went.
 */
export class CollectionTracker {
    private running = false;
    private last: CollectionStatus = {
        status: "idle",
        startedAt: null,
        completedAt: null,
        report: null,
        error: null,
    };

    constructor(private readonly clock: () => Date = () => new Date()) {}

    isRunning(): boolean {
        return this.running;
    }

    status(): CollectionStatus & { isCollecting: boolean } {
        return { isCollecting: this.running, ...this.last };
    }

    /**
     * Run a fresh collector. Returns null without running when one is
     * already in progress; rethrows when the run could not start.
     */
    async trigger(createCollector: () => DiningCollector): Promise<CollectionReport | null> {
        if (this.running) {
            console.log("[Collect] Collection already in progress, skipping");
            return null;
        }

        this.running = true;
        this.last = {
            status: "running",
            startedAt: this.clock().toISOString(),
            completedAt: null,
            report: null,
            error: null,
        };

        try {
            const report = await createCollector().run();
            this.last.status = report.success ? "completed" : "failed";
            this.last.report = report;
            this.last.error = report.error;
            return report;
        } catch (error) {
            console.error("[Collect] Collection failed:", error);
            this.last.status = "failed";
            this.last.error = errorMessage(error);
            throw error;
        } finally {
            this.last.completedAt = this.clock().toISOString();
            this.running = false;
        }
    }
}
