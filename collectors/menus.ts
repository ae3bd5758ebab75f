import { errorMessage, ParseError } from "../errors";
import { firstDigits, type HtmlDocument } from "../html";
import { fetchDocument, type PageFetcher } from "../scraping";
import { hasMenuFor, mergeDayMenu } from "../scripts/merge";
import type { CanonicalDocument, DayMenu, HallSource, MenuSections } from "../types";
import { compactKey, menuWindow, resolveUrl, sleep } from "../utils";
import type { ItemResolver } from "./items";

const MEAL_CONTAINER_IDS = ["breakfastmenu", "lunchmenu", "dinnermenu"];

export interface ItemReference {
    id: string;
    url: string;
}

export interface ParsedMenuPage {
    menu: DayMenu;
    /** Distinct items in page order */
    items: ItemReference[];
}

export interface MenuCollectorOptions {
    halls: HallSource[];
    siteBaseUrl: string;
    /** Delay between page requests. Default: 0 */
    delayMs?: number;
}

export interface MenuStageResult {
    attempted: number;
    succeeded: number;
    skipped: number;
    /** Days collected, in units of a full window per hall */
    hallsCollected: number;
    ok: boolean;
}

export function menuPageUrl(link: string, date: string): string {
    const url = new URL(link);
    url.searchParams.set("date", date);
    return url.toString();
}

/**
 * A page with neither a closure notice nor any meal container throws, so the
 * date stays unset and a later run fetches it again.
 */
export function parseMenuPage(page: HtmlDocument, siteBaseUrl: string): ParsedMenuPage {
    if (page.find({ tag: "p", classes: ["dining-status"] })) {
        return { menu: { open: false }, items: [] };
    }

    if (!MEAL_CONTAINER_IDS.some((containerId) => page.find({ tag: "div", id: containerId }))) {
        throw new ParseError("no closure notice and no meal container", "menu page");
    }

    const meals: Record<string, MenuSections> = {};
    const items: ItemReference[] = [];
    const seen = new Set<string>();

    for (const containerId of MEAL_CONTAINER_IDS) {
        for (const meal of page.findAll({ tag: "div", id: containerId })) {
            const heading = meal.findNext({ tag: "h2" });
            if (!heading) continue;

            const sections: MenuSections = {};
            meals[compactKey(heading.text())] = sections;

            const container = meal.findNext({ tag: "div", classes: ["at-a-glance-menu__dining-location"] });
            if (!container) continue;

            for (const block of container.childElements({ tag: "div" })) {
                const header = block.find({ tag: "h2" });
                if (!header) continue;

                const list = block.findNext({ tag: "div", classes: ["recipe-list"] });
                if (!list) continue;

                const ids: string[] = [];
                for (const card of list.findAll({ tag: "section", classes: ["recipe-card"] })) {
                    const href = card.find({ tag: "a", hasAttrs: ["href"] })?.attr("href");
                    const id = href ? firstDigits(href) : null;
                    if (!href || !id) continue;

                    ids.push(id);
                    if (!seen.has(id)) {
                        seen.add(id);
                        items.push({ id, url: resolveUrl(href, siteBaseUrl) });
                    }
                }

                sections[compactKey(header.text())] = ids;
            }
        }
    }

    return { menu: { open: true, meals }, items };
}

/**
 * Collect each hall's menu for every day in the window that is not in the
 * document yet. A failed hall/date is logged and the rest carry on.
 */
export async function collectMenus(
    fetcher: PageFetcher,
    document: CanonicalDocument,
    resolver: ItemResolver,
    options: MenuCollectorOptions,
    today: Date
): Promise<MenuStageResult> {
    const dates = menuWindow(today);
    const delayMs = options.delayMs ?? 0;
    const result: MenuStageResult = { attempted: 0, succeeded: 0, skipped: 0, hallsCollected: 0, ok: false };

    for (const hall of options.halls) {
        const link = document.halls[hall.code]?.link ?? hall.menuUrl;

        for (const date of dates) {
            if (hasMenuFor(document, hall.code, date)) {
                result.skipped++;
                continue;
            }

            if (result.attempted > 0 && delayMs > 0) {
                await sleep(delayMs);
            }
            result.attempted++;

            try {
                const page = await fetchDocument(fetcher, menuPageUrl(link, date));
                const parsed = parseMenuPage(page, options.siteBaseUrl);
                mergeDayMenu(document, hall.code, link, date, parsed.menu);
                result.succeeded++;

                console.log(
                    `[Menus] ${hall.code} ${date}: ${parsed.menu.open ? `${parsed.items.length} items` : "closed"}`
                );

                for (const item of parsed.items) {
                    await resolver.resolve(item.id, item.url);
                }
            } catch (error) {
                console.error(`[Menus] Failed to collect ${hall.code} for ${date}: ${errorMessage(error)}`);
            }
        }
    }

    result.hallsCollected = result.succeeded / dates.length;
    result.ok = result.attempted === 0 || result.succeeded > 0;
    console.log(`[Menus] Collected ${result.hallsCollected.toFixed(2)}/${options.halls.length} halls`);
    return result;
}
