import { errorMessage, FetchError } from "../errors";
import { facilityCountSchema, type FacilityCount } from "../schema";
import type { PageFetcher } from "../scraping";
import type { DiningSources } from "../types";

export const NOT_AVAILABLE = "Not available";

export interface GymAreaCount {
    lastCount: number;
    isClosed: boolean;
    capacity: number;
}

/** A hall reports a percentage ("45%"); a gym reports a count per area */
export type ActivityReading = string | Record<string, GymAreaCount>;

export function parseActivityPercentage(body: string): string | null {
    const match = body.match(/(\d+%)/);
    return match ? match[1] : null;
}

/**
 * Group facility records under the gym code their facility name maps to.
 * Records for facilities we do not track are dropped.
 */
export function groupFacilityCounts(
    records: FacilityCount[],
    facilityCodes: Map<string, string>
): Record<string, Record<string, GymAreaCount>> {
    const grouped: Record<string, Record<string, GymAreaCount>> = {};

    for (const record of records) {
        const code = facilityCodes.get(record.FacilityName);
        if (!code) continue;

        grouped[code] ??= {};
        grouped[code][record.LocationName] = {
            lastCount: record.LastCount,
            isClosed: record.IsClosed,
            capacity: record.TotalCapacity,
        };
    }

    return grouped;
}

/**
 * Live occupancy, read on request from the halls' activity meters and the
 * gyms' facility-count API. Nothing here touches the canonical document.
 */
export class ActivityReader {
    private readonly hallUrls: Map<string, string>;
    private readonly facilityCodes: Map<string, string>;

    constructor(
        private readonly fetcher: PageFetcher,
        sources: DiningSources,
        private readonly gymCountsUrl: string | null
    ) {
        this.hallUrls = new Map(
            sources.halls.filter((hall) => hall.activityUrl).map((hall) => [hall.code, hall.activityUrl])
        );
        this.facilityCodes = new Map(sources.gyms.map((gym) => [gym.facilityName, gym.code]));
    }

    locations(): string[] {
        return [...this.hallUrls.keys(), ...this.facilityCodes.values()];
    }

    hasLocation(code: string): boolean {
        return this.locations().includes(code);
    }

    async readGyms(): Promise<Record<string, Record<string, GymAreaCount>>> {
        if (!this.gymCountsUrl) {
            throw new FetchError("GYM_COUNTS_URL is not configured", "");
        }

        const body = await this.fetcher.fetchText(this.gymCountsUrl);
        const records = facilityCountSchema.parse(JSON.parse(body));
        return groupFacilityCounts(records, this.facilityCodes);
    }

    /** Throws for unknown codes and for readings that could not be fetched */
    async read(code: string): Promise<ActivityReading> {
        const hallUrl = this.hallUrls.get(code);
        if (hallUrl) {
            const reading = parseActivityPercentage(await this.fetcher.fetchText(hallUrl));
            if (!reading) {
                throw new FetchError(`No activity reading on the meter page for ${code}`, hallUrl);
            }
            return reading;
        }

        if ([...this.facilityCodes.values()].includes(code)) {
            const gyms = await this.readGyms();
            return gyms[code] ?? {};
        }

        throw new Error(`Unknown activity location "${code}"`);
    }

    /** Every location; ones that fail read as "Not available" */
    async readAll(): Promise<Record<string, ActivityReading>> {
        const results: Record<string, ActivityReading> = {};

        try {
            const gyms = await this.readGyms();
            for (const code of this.facilityCodes.values()) {
                results[code] = gyms[code] ?? {};
            }
        } catch (error) {
            console.warn(`[Activity] Gym counts unavailable: ${errorMessage(error)}`);
            for (const code of this.facilityCodes.values()) {
                results[code] = NOT_AVAILABLE;
            }
        }

        for (const [code, url] of this.hallUrls) {
            try {
                results[code] = parseActivityPercentage(await this.fetcher.fetchText(url)) ?? NOT_AVAILABLE;
            } catch (error) {
                console.warn(`[Activity] Activity data not found for ${code}: ${errorMessage(error)}`);
                results[code] = NOT_AVAILABLE;
            }
        }

        return results;
    }
}
