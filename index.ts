import cron from "node-cron";
import { createApp } from "./app";
import { ActivityReader } from "./collectors/activity";
import { loadConfig } from "./config";
import { HttpPageFetcher } from "./scraping";
import { createDiningCollector } from "./scripts/collect-core";
import { CollectionTracker } from "./scripts/collection-status";
import { DocumentCache } from "./scripts/document-cache";
import { createBlobStore } from "./scripts/store";
import { loadSources } from "./sources";

async function main(): Promise<void> {
    const config = loadConfig();
    const sources = await loadSources(config.sourcesDir);
    const store = createBlobStore(config);

    const cache = new DocumentCache(store, config.documentKey);
    const tracker = new CollectionTracker();
    const activity = new ActivityReader(
        new HttpPageFetcher({ timeoutMs: config.fetchTimeoutMs, maxAttempts: 1 }),
        sources,
        config.gymCountsUrl
    );

    const app = createApp({ cache, sources, activity, tracker });

    cron.schedule(
        config.collectCronSchedule,
        async () => {
            console.log(`[Cron] Scheduled collection triggered at ${new Date().toISOString()}`);
            try {
                const report = await tracker.trigger(() => createDiningCollector(config, store, sources));
                if (report) {
                    console.log(`[Cron] Scheduled collection finished (success: ${report.success})`);
                }
            } catch (error) {
                console.error(`[Cron] Scheduled collection failed:`, error);
            }
        },
        {
            timezone: config.collectTimezone,
        }
    );

    console.log(`[Cron] Collection scheduled: "${config.collectCronSchedule}" (timezone: ${config.collectTimezone})`);

    app.listen(config.port, () => {
        console.log(`Server running at http://localhost:${config.port}`);
    });
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
