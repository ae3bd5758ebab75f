import "dotenv/config"; // Load environment variables
import path from "path";

export type StoreDriver = "sqlite" | "file";

export interface AppConfig {
    port: number;
    siteBaseUrl: string;
    hoursUrl: string;
    trucksUrl: string;
    gymCountsUrl: string | null;
    storeDriver: StoreDriver;
    storePath: string;
    documentKey: string;
    sourcesDir: string;
    fetchTimeoutMs: number;
    fetchMaxAttempts: number;
    fetchBackoffMs: number;
    collectDelayMs: number;
    collectCronSchedule: string;
    collectTimezone: string;
}

function numberFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        console.warn(`[Config] Ignoring ${name}="${raw}", using ${fallback}`);
        return fallback;
    }
    return value;
}

function storeDriverFromEnv(): StoreDriver {
    const raw = process.env.STORE_DRIVER || "sqlite";
    if (raw === "sqlite" || raw === "file") return raw;
    throw new Error(`STORE_DRIVER must be "sqlite" or "file", got "${raw}"`);
}

export function loadConfig(): AppConfig {
    const storeDriver = storeDriverFromEnv();
    const defaultStorePath = storeDriver === "sqlite" ? "data/dining.db" : "data/store";

    return {
        port: numberFromEnv("PORT", 8072),
        siteBaseUrl: process.env.SITE_BASE_URL || "https://dining.ucla.edu",
        hoursUrl: process.env.HOURS_URL || "https://dining.ucla.edu/dining-locations/",
        trucksUrl: process.env.TRUCKS_URL || "https://dining.ucla.edu/meal-swipe-exchange/",
        gymCountsUrl: process.env.GYM_COUNTS_URL || null,
        storeDriver,
        // process.cwd() so compiled and source runs resolve the same paths
        storePath: path.resolve(process.cwd(), process.env.STORE_PATH || defaultStorePath),
        documentKey: process.env.DOCUMENT_KEY || "dining_info.json",
        sourcesDir: path.resolve(process.cwd(), process.env.SOURCES_DIR || "data"),
        fetchTimeoutMs: numberFromEnv("FETCH_TIMEOUT_MS", 15000),
        fetchMaxAttempts: Math.max(1, numberFromEnv("FETCH_MAX_ATTEMPTS", 3)),
        fetchBackoffMs: numberFromEnv("FETCH_BACKOFF_MS", 500),
        collectDelayMs: numberFromEnv("COLLECT_DELAY_MS", 0),
        collectCronSchedule: process.env.COLLECT_CRON_SCHEDULE || "0 4 * * *",
        collectTimezone: process.env.COLLECT_TIMEZONE || "America/Los_Angeles",
    };
}
