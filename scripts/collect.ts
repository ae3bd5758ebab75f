/**
 * Collection Script
 *
 * Runs one collection against the live site and saves the result.
 * Run via: npm run collect
 */

import { loadConfig } from "../config";
import { loadSources } from "../sources";
import { createDiningCollector } from "./collect-core";
import { createBlobStore } from "./store";

async function main(): Promise<void> {
    const config = loadConfig();
    const sources = await loadSources(config.sourcesDir);
    const store = createBlobStore(config);

    const report = await createDiningCollector(config, store, sources).run();
    process.exitCode = report.success ? 0 : 1;
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
