import { errorMessage, ParseError } from "../errors";
import type { HtmlDocument } from "../html";
import { fetchDocument, type PageFetcher } from "../scraping";
import { mergeTruckWeek } from "../scripts/merge";
import { EVENING_SLOT, LATE_NIGHT_SLOT, isWeekday, type CanonicalDocument, type TruckRecord } from "../types";

/**
 * "Meal Swipe Exchange Food Truck Schedule for the week of Oct. 12" -> "Oct. 12"
 */
export function readWeekLabel(page: HtmlDocument): string {
    const heading = page.find({ tag: "h2", classes: ["wp-block-heading", "alignwide"] });
    if (!heading) {
        throw new ParseError("week heading not found", "trucks");
    }

    const text = heading.text();
    const match = text.match(/week of\s+(.+)$/i);
    return match ? match[1].trim() : text;
}

export function parseTruckSchedules(page: HtmlDocument): Record<string, TruckRecord> {
    const schedules: Record<string, TruckRecord> = {};

    for (const heading of page.findAll({ tag: "h3", classes: ["wp-block-heading"] })) {
        const location = heading.text().toLowerCase();
        const record: TruckRecord = schedules[location] ?? {};
        schedules[location] = record;

        const body = heading.findNext({ tag: "tbody" });
        if (!body) continue;

        for (const row of body.childElements({ tag: "tr" })) {
            const cells = row.findAll({ tag: "td" });
            if (cells.length < 3) continue;

            const day = cells[0].text().toLowerCase().slice(0, 3);
            if (!isWeekday(day)) continue;

            record[day] = {
                [EVENING_SLOT]: cells[1].text(),
                [LATE_NIGHT_SLOT]: cells[2].text(),
            };
        }
    }

    return schedules;
}

/**
 * Reparse the truck schedule when the page announces a new week.
 */
export async function collectTrucks(
    fetcher: PageFetcher,
    document: CanonicalDocument,
    url: string
): Promise<boolean> {
    try {
        const page = await fetchDocument(fetcher, url);
        const weekOf = readWeekLabel(page);

        if (document.trucks.week_of === weekOf) {
            console.log(`[Trucks] Schedule for week of ${weekOf} already collected`);
            return true;
        }

        const schedules = parseTruckSchedules(page);
        mergeTruckWeek(document, weekOf, schedules);
        console.log(`[Trucks] Collected week of ${weekOf} (${Object.keys(schedules).length} locations)`);
        return true;
    } catch (error) {
        console.error(`[Trucks] Failed to collect truck schedule: ${errorMessage(error)}`);
        return false;
    }
}
