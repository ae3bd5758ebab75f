import { errorMessage, ParseError } from "../errors";
import { firstDigits, type ElementQuery, type HtmlDocument } from "../html";
import { fetchDocument, type PageFetcher } from "../scraping";
import { hasItem, mergeItem } from "../scripts/merge";
import type { CanonicalDocument, CompositeItem, NutrientValue, StandardItem } from "../types";
import { resolveUrl } from "../utils";

const ITEM_NAME: ElementQuery = { tag: "h2", classes: ["headline-text__lg"] };
const CALORIES: ElementQuery = { tag: "p", classes: ["single-calories"] };

/**
 * Parse an item page that carries its own nutrition facts.
 * Returns null when the page has no name heading or no nutrition section.
 */
export function parseStandardItem(page: HtmlDocument): StandardItem | null {
    const name = page.find(ITEM_NAME);
    if (!name) return null;

    const nutrition = page.find({ tag: "div", id: "nutrition" });
    if (!nutrition) return null;

    // Dietary icons are named after the label: /icons/vegan.svg
    const labels: string[] = [];
    const content = page.find({ tag: "div", classes: ["single-menu-page-content"] });
    for (const icon of content ? content.findAll({ tag: "img" }) : []) {
        const match = (icon.attr("src") ?? "").match(/([^/.]*)\.svg/);
        if (match && match[1] && !labels.includes(match[1])) {
            labels.push(match[1]);
        }
    }

    const servingSize = page.find({ tag: "strong" })?.nextTextSibling() || null;
    const calories = nutrition.find(CALORIES)?.find({ tag: "span" })?.nextTextSibling() || null;

    const nutrients: Record<string, NutrientValue> = {};
    for (const span of nutrition.findAll({ tag: "span" })) {
        if (span.closest(CALORIES)) continue;

        const value = span.nextTextSibling();
        if (!value) continue;

        const row = span.closest({ tag: "tr" });
        const percent = row ? span.findNext({ tag: "td" }, row)?.text() || null : null;
        nutrients[span.text().toLowerCase()] = [value, percent];
    }

    return {
        kind: "standard",
        name: name.text(),
        labels,
        serving_size: servingSize,
        calories,
        nutrients,
    };
}

export interface ResolverStats {
    fetched: number;
    failed: number;
}

/**
 * Fills `items` for the ids found on menu pages. An id already in the
 * document is never fetched again; composite items pull in their
 * ingredients recursively.
 */
export class ItemResolver {
    /** Ids on the current recursion path, so a cycle ends instead of recursing forever */
    private readonly inProgress = new Set<string>();
    /** Ids that failed during this run; left out of `items` so the next run tries again */
    private readonly failed = new Set<string>();
    private readonly stats: ResolverStats = { fetched: 0, failed: 0 };

    constructor(
        private readonly fetcher: PageFetcher,
        private readonly document: CanonicalDocument,
        private readonly siteBaseUrl: string
    ) {}

    getStats(): ResolverStats {
        return { ...this.stats };
    }

    async resolve(itemId: string, url: string): Promise<boolean> {
        if (hasItem(this.document, itemId) || this.inProgress.has(itemId)) {
            return true;
        }
        if (this.failed.has(itemId)) {
            return false;
        }

        this.inProgress.add(itemId);
        try {
            this.stats.fetched++;
            const page = await fetchDocument(this.fetcher, url);
            const item = parseStandardItem(page) ?? (await this.resolveComposite(page, itemId));
            mergeItem(this.document, itemId, item);
            return true;
        } catch (error) {
            this.stats.failed++;
            this.failed.add(itemId);
            console.error(`[Items] Failed to resolve item ${itemId} (${url}): ${errorMessage(error)}`);
            return false;
        } finally {
            this.inProgress.delete(itemId);
        }
    }

    private async resolveComposite(page: HtmlDocument, itemId: string): Promise<CompositeItem> {
        const name = page.find(ITEM_NAME);
        if (!name) {
            throw new ParseError("no item name on page", `item ${itemId}`);
        }

        const ingredients: Record<string, string[]> = {};

        for (const group of page.findAll({ tag: "div", classes: ["complex-ingredient-group"] })) {
            const header = group.find({ tag: "h4" });
            if (!header) continue;

            const ids: string[] = [];
            ingredients[header.text()] = ids;

            for (const entry of group.findAll({ tag: "li" })) {
                const href = entry.find({ tag: "a", hasAttrs: ["href"] })?.attr("href");
                const ingredientId = href ? firstDigits(href) : null;
                if (!href || !ingredientId) continue;

                await this.resolve(ingredientId, resolveUrl(href, this.siteBaseUrl));
                ids.push(ingredientId);
            }
        }

        return { kind: "composite", name: name.text(), ingredients };
    }
}
