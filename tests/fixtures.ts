/**
 * Shared test doubles and HTML page builders.
 * The markup mirrors the structure of the dining site's pages.
 */

import { FetchError } from "../errors";
import type { PageFetcher } from "../scraping";
import type { BlobStore, StoredBlob } from "../scripts/store";
import type { DiningSources, HallCode, HallSource } from "../types";

export const SITE = "https://dining.example.edu";
export const HOURS_URL = `${SITE}/dining-locations/`;
export const TRUCKS_URL = `${SITE}/meal-swipe-exchange/`;

/** Sunday, 18 October 2026, noon local time */
export const SUNDAY_NOON = new Date(2026, 9, 18, 12, 0);

export class FakeFetcher implements PageFetcher {
    readonly calls: string[] = [];
    private readonly pages = new Map<string, string>();

    constructor(pages: Record<string, string> = {}) {
        for (const [url, html] of Object.entries(pages)) {
            this.pages.set(url, html);
        }
    }

    set(url: string, html: string): this {
        this.pages.set(url, html);
        return this;
    }

    callsTo(url: string): number {
        return this.calls.filter((call) => call === url).length;
    }

    async fetchText(url: string): Promise<string> {
        this.calls.push(url);
        const page = this.pages.get(url);
        if (page === undefined) {
            throw new FetchError(`Failed to fetch ${url}: Status 404`, url, 404);
        }
        return page;
    }
}

export class MemoryBlobStore implements BlobStore {
    readonly blobs = new Map<string, StoredBlob>();
    failReads = false;
    failWrites = false;
    puts = 0;
    private version = 0;

    async get(key: string): Promise<StoredBlob | null> {
        if (this.failReads) throw new Error("store unreachable");
        return this.blobs.get(key) ?? null;
    }

    async head(key: string): Promise<Date | null> {
        if (this.failReads) throw new Error("store unreachable");
        return this.blobs.get(key)?.lastModified ?? null;
    }

    async put(key: string, body: string): Promise<void> {
        if (this.failWrites) throw new Error("store unreachable");
        this.puts++;
        this.version++;
        this.blobs.set(key, { body, lastModified: new Date(Date.UTC(2026, 0, 1, 0, 0, this.version)) });
    }

    bodyOf(key: string): string | undefined {
        return this.blobs.get(key)?.body;
    }
}

export const BRUIN_PLATE: HallSource = {
    code: "b-plate",
    name: "Bruin Plate",
    menuUrl: `${SITE}/bruin-plate/`,
    activityUrl: `${SITE}/activity?location_id=864`,
};

export const THE_DREY: HallSource = {
    code: "drey",
    name: "The Drey",
    menuUrl: `${SITE}/the-drey/`,
    activityUrl: `${SITE}/activity?location_id=869`,
};

export function testSources(halls: HallSource[] = [BRUIN_PLATE, THE_DREY]): DiningSources {
    return {
        halls,
        aliases: new Map<string, HallCode>([
            ["Bruin Plate", "b-plate"],
            ["Sproul Dining", "b-plate"],
            ["The Drey", "drey"],
        ]),
        gyms: [{ code: "b-fit", facilityName: "Bruin Fitness Center - FITWELL" }],
    };
}

export function itemUrl(id: string): string {
    return `${SITE}/menu-item/?recipe=${id}`;
}

export function menuUrl(hall: HallSource, date: string): string {
    return `${hall.menuUrl}?date=${date}`;
}

function page(body: string): string {
    return `<!DOCTYPE html><html><head><title>Dining</title></head><body>${body}</body></html>`;
}

export interface HoursRow {
    name: string;
    href?: string;
    cells: string[];
}

export function hoursPage(rows: HoursRow[]): string {
    const body = rows
        .map(
            (row) =>
                `<tr><th><a href="${row.href ?? "/location/"}">${row.name}</a></th>` +
                row.cells.map((cell) => `<td>\n  ${cell}\n</td>`).join("") +
                `</tr>`
        )
        .join("\n");

    return page(
        `<table class="dining-hours-table"><thead><tr><th>Location</th><th>Breakfast</th><th>Lunch</th>` +
            `<th>Dinner</th><th>Extended Dinner</th></tr></thead><tbody>${body}</tbody></table>`
    );
}

export interface TruckLocation {
    name: string;
    rows: Array<[day: string, evening: string, lateNight: string]>;
}

export function trucksPage(week: string, locations: TruckLocation[]): string {
    const tables = locations
        .map(
            (location) =>
                `<h3 class="wp-block-heading">${location.name}</h3>` +
                `<figure class="wp-block-table"><table><thead><tr><th>Day</th><th>5 p.m. – 8:30 p.m.</th>` +
                `<th>10 p.m. – 12 a.m.</th></tr></thead><tbody>` +
                location.rows.map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join("")}</tr>`).join("") +
                `</tbody></table></figure>`
        )
        .join("\n");

    return page(
        `<h2 class="wp-block-heading alignwide">Meal Swipe Exchange Food Truck Schedule for the Week of ${week}</h2>${tables}`
    );
}

export interface MenuMeal {
    containerId: "breakfastmenu" | "lunchmenu" | "dinnermenu";
    title: string;
    sections: Array<{ name: string; itemIds: string[] }>;
}

export function menuPage(meals: MenuMeal[]): string {
    return page(
        meals
            .map(
                (meal) =>
                    `<div id="${meal.containerId}"><h2 class="meal-title">${meal.title}</h2>` +
                    `<div class="at-a-glance-menu__dining-location">` +
                    meal.sections
                        .map(
                            (section) =>
                                `<div class="station"><h2 class="station-name">${section.name}</h2>` +
                                `<div class="recipe-list">` +
                                section.itemIds
                                    .map(
                                        (id) =>
                                            `<section class="recipe-card"><a href="/menu-item/?recipe=${id}">Item ${id}</a></section>`
                                    )
                                    .join("") +
                                `</div></div>`
                        )
                        .join("") +
                    `</div></div>`
            )
            .join("\n")
    );
}

export function closedMenuPage(): string {
    return page(`<p class="dining-status">Closed today</p><div id="lunchmenu"><h2>Lunch</h2></div>`);
}

export interface StandardItemFixture {
    name: string;
    icons?: string[];
    serving?: string;
    calories?: string;
    nutrients?: Array<[label: string, value: string, percent?: string]>;
}

export function standardItemPage(item: StandardItemFixture): string {
    const icons = (item.icons ?? []).map((icon) => `<img src="/wp-content/icons/${icon}.svg" alt="${icon}">`).join("");
    const rows = (item.nutrients ?? [])
        .map(
            ([label, value, percent]) =>
                `<tr><td><span>${label}</span> ${value}</td>${percent === undefined ? "" : `<td>${percent}</td>`}</tr>`
        )
        .join("");

    return page(
        `<div class="single-menu-page-content"><h2 class="headline-text__lg"> ${item.name} </h2>${icons}</div>` +
            `<div id="nutrition">` +
            `<p class="single-serving"><strong>Serving Size</strong> ${item.serving ?? "1 each"}</p>` +
            `<p class="single-calories"><span>Calories</span> ${item.calories ?? "100"}</p>` +
            `<table><tbody>${rows}</tbody></table>` +
            `</div>`
    );
}

export function compositeItemPage(name: string, groups: Array<[label: string, ids: string[]]>): string {
    return page(
        `<div class="single-menu-page-content"><h2 class="headline-text__lg">${name}</h2></div>` +
            groups
                .map(
                    ([label, ids]) =>
                        `<div class="complex-ingredient-group"><h4>${label}</h4><ul>` +
                        ids.map((id) => `<li><a href="/menu-item/?recipe=${id}">Ingredient ${id}</a></li>`).join("") +
                        `</ul></div>`
                )
                .join("")
    );
}
