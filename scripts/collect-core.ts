/**
 * Core Collection Logic
 *
 * Shared by the CLI (scripts/collect.ts) and the scheduled run in index.ts.
 * One DiningCollector performs one run: load the stored document, collect
 * hours, trucks and menus (items are resolved as menus are read), then
 * write the document back if every stage succeeded.
 */

import { collectHours } from "../collectors/hours";
import { ItemResolver, type ResolverStats } from "../collectors/items";
import { collectMenus, type MenuStageResult } from "../collectors/menus";
import { collectTrucks } from "../collectors/trucks";
import type { AppConfig } from "../config";
import { errorMessage } from "../errors";
import { HttpPageFetcher, type PageFetcher } from "../scraping";
import type { DiningSources } from "../types";
import { loadDocument, saveDocument, type BlobStore } from "./store";

export interface CollectorDependencies {
    fetcher: PageFetcher;
    store: BlobStore;
    sources: DiningSources;
    /** Defaults to the system clock */
    clock?: () => Date;
}

export interface CollectorOptions {
    documentKey: string;
    siteBaseUrl: string;
    hoursUrl: string;
    trucksUrl: string;
    /** Delay in milliseconds between menu pages. Default: 0 */
    delayMs?: number;
}

export interface CollectionReport {
    startedAt: string;
    finishedAt: string;
    hours: boolean;
    trucks: boolean;
    menus: MenuStageResult;
    items: ResolverStats;
    persisted: boolean;
    success: boolean;
    error: string | null;
}

export class DiningCollector {
    private readonly clock: () => Date;

    constructor(
        private readonly deps: CollectorDependencies,
        private readonly options: CollectorOptions
    ) {
        this.clock = deps.clock ?? (() => new Date());
    }

    /**
     * Throws a PersistenceError, before collecting anything, when the stored
     * document cannot be read. Every other failure is reported, not thrown.
     */
    async run(): Promise<CollectionReport> {
        const { fetcher, store, sources } = this.deps;
        const now = this.clock();
        const startedAt = now.toISOString();

        console.log("=".repeat(60));
        console.log(`Starting collection at ${startedAt}`);
        console.log("=".repeat(60));

        console.log("\n[1/5] Loading stored document...");
        const document = await loadDocument(store, this.options.documentKey);

        console.log("[2/5] Collecting hours...");
        const hours = await collectHours(
            fetcher,
            document,
            {
                url: this.options.hoursUrl,
                siteBaseUrl: this.options.siteBaseUrl,
                aliases: sources.aliases,
                halls: sources.halls,
            },
            now
        );

        console.log("[3/5] Collecting food truck schedule...");
        const trucks = await collectTrucks(fetcher, document, this.options.trucksUrl);

        console.log("[4/5] Collecting menus and items...");
        const resolver = new ItemResolver(fetcher, document, this.options.siteBaseUrl);
        const menus = await collectMenus(
            fetcher,
            document,
            resolver,
            { halls: sources.halls, siteBaseUrl: this.options.siteBaseUrl, delayMs: this.options.delayMs },
            now
        );

        const report: CollectionReport = {
            startedAt,
            finishedAt: startedAt,
            hours,
            trucks,
            menus,
            items: resolver.getStats(),
            persisted: false,
            success: false,
            error: null,
        };

        if (hours && trucks && menus.ok) {
            console.log("[5/5] Saving document...");
            try {
                await saveDocument(store, this.options.documentKey, document, this.clock());
                report.persisted = true;
                report.success = true;
            } catch (error) {
                report.error = errorMessage(error);
                console.error(`[Collect] ${report.error}`);
            }
        } else {
            report.error = "One or more stages failed; document not saved";
            console.log(`[5/5] Skipping save: ${report.error}`);
        }

        report.finishedAt = this.clock().toISOString();
        printSummary(report);
        return report;
    }
}

/**
 * A collector wired to the live site with the configured fetch policy.
 */
export function createDiningCollector(config: AppConfig, store: BlobStore, sources: DiningSources): DiningCollector {
    const fetcher = new HttpPageFetcher({
        timeoutMs: config.fetchTimeoutMs,
        maxAttempts: config.fetchMaxAttempts,
        backoffMs: config.fetchBackoffMs,
    });

    return new DiningCollector(
        { fetcher, store, sources },
        {
            documentKey: config.documentKey,
            siteBaseUrl: config.siteBaseUrl,
            hoursUrl: config.hoursUrl,
            trucksUrl: config.trucksUrl,
            delayMs: config.collectDelayMs,
        }
    );
}

function printSummary(report: CollectionReport): void {
    console.log("\n" + "=".repeat(60));
    console.log(report.success ? "Collection Complete!" : "Collection Failed");
    console.log("=".repeat(60));
    console.log(`Hours:             ${report.hours ? "ok" : "failed"}`);
    console.log(`Trucks:            ${report.trucks ? "ok" : "failed"}`);
    console.log(`Menu days:         ${report.menus.succeeded}/${report.menus.attempted} (${report.menus.skipped} already stored)`);
    console.log(`Items fetched:     ${report.items.fetched} (${report.items.failed} failed)`);
    console.log(`Saved:             ${report.persisted ? "yes" : "no"}`);
    console.log(`Finished at:       ${report.finishedAt}`);
    console.log("=".repeat(60));
}
