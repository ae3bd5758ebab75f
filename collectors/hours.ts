import { errorMessage, ParseError } from "../errors";
import type { ElementQuery, HtmlDocument, HtmlNode } from "../html";
import { fetchDocument, type PageFetcher } from "../scraping";
import { hasHoursFor, mergeHours } from "../scripts/merge";
import type { CanonicalDocument, DayHours, HallCode, HallSource } from "../types";
import { isoDate, resolveUrl, weekdayCode } from "../utils";

const ANCHOR: ElementQuery = { tag: "a", hasAttrs: ["href"] };
const CELL: ElementQuery = { tag: "td" };

/** Hall whose hours decide whether today's page was already collected */
export const SENTINEL_HALL: HallCode = "drey";

export interface HoursCollectorOptions {
    url: string;
    siteBaseUrl: string;
    aliases: Map<string, HallCode>;
    halls: HallSource[];
}

export interface ParsedHallHours {
    code: HallCode;
    href: string | null;
    hours: DayHours;
}

function takeCells(start: HtmlNode, table: HtmlNode, count: number): HtmlNode[] {
    const cells: HtmlNode[] = [];
    let cursor: HtmlNode | null = start;
    while (cells.length < count) {
        cursor = cursor.findNext(CELL, table);
        if (!cursor) break;
        cells.push(cursor);
    }
    return cells;
}

/**
 * The hours table is a flat run of location anchors, each followed by four
 * cells (breakfast, lunch, dinner, extended dinner). Walk it with a cursor;
 * anchors we have no hall code for are stepped over along with their cells.
 */
export function parseHoursTable(page: HtmlDocument, aliases: Map<string, HallCode>): ParsedHallHours[] {
    const table = page.find({ tag: "table", classes: ["dining-hours-table"] });
    if (!table) {
        throw new ParseError("dining hours table not found", "hours");
    }

    const parsed: ParsedHallHours[] = [];
    let cursor = table.find(ANCHOR);

    while (cursor) {
        const code = aliases.get(cursor.text());
        if (!code) {
            cursor = cursor.findNext(ANCHOR, table);
            continue;
        }

        const cells = takeCells(cursor, table, 4);
        if (cells.length < 4) {
            console.warn(`[Hours] Table ends before all four periods of "${cursor.text()}"`);
            break;
        }

        const [breakfast, lunch, dinner, extDinner] = cells;
        parsed.push({
            code,
            href: cursor.attr("href"),
            hours: {
                breakfast: breakfast.text(),
                lunch: lunch.text(),
                dinner: dinner.text(),
                ext_dinner: extDinner.text(),
            },
        });

        cursor = extDinner.findNext(ANCHOR, table);
    }

    return parsed;
}

/**
 * Collect today's hours into `halls[*].hours[day]`.
 * Returns false when the page could not be fetched or had no hours table.
 */
export async function collectHours(
    fetcher: PageFetcher,
    document: CanonicalDocument,
    options: HoursCollectorOptions,
    now: Date
): Promise<boolean> {
    const day = weekdayCode(now);
    const date = isoDate(now);

    if (hasHoursFor(document, SENTINEL_HALL, day, date)) {
        console.log(`[Hours] Hours for ${day} already collected on ${date}`);
        return true;
    }

    try {
        const page = await fetchDocument(fetcher, options.url);
        const rows = parseHoursTable(page, options.aliases);

        let recorded = 0;
        for (const row of rows) {
            const configured = options.halls.find((hall) => hall.code === row.code);
            const link = row.href
                ? resolveUrl(row.href, options.siteBaseUrl)
                : configured?.menuUrl ?? options.siteBaseUrl;

            if (mergeHours(document, row.code, link, day, date, row.hours)) {
                recorded++;
            }
        }

        console.log(`[Hours] Recorded ${day} hours for ${recorded} halls`);
        return true;
    } catch (error) {
        console.error(`[Hours] Failed to collect hours: ${errorMessage(error)}`);
        return false;
    }
}
