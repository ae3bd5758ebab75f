/**
 * Canonical Document Merge
 *
 * Every write the collectors make goes through here. Each helper is a
 * skip-if-present merge: data already in the document is never replaced,
 * so a partial re-run cannot clobber a complete earlier one.
 */

import type {
    CanonicalDocument,
    DayHours,
    DayMenu,
    HallCode,
    HallRecord,
    ItemRecord,
    TruckRecord,
    Weekday,
} from "../types";

export function emptyDocument(): CanonicalDocument {
    return {
        halls: {},
        trucks: { week_of: null, locations: {} },
        items: {},
        last_updated: null,
    };
}

/**
 * Returns the hall's record, creating an empty one pointing at `link` when
 * the hall has not been seen yet.
 */
export function ensureHall(document: CanonicalDocument, code: HallCode, link: string): HallRecord {
    const existing = document.halls[code];
    if (existing) return existing;

    const created: HallRecord = { link, hours: {}, hours_collected: {}, menu: {} };
    document.halls[code] = created;
    return created;
}

export function hasHoursFor(document: CanonicalDocument, code: HallCode, day: Weekday, date: string): boolean {
    return document.halls[code]?.hours_collected[day] === date;
}

/**
 * Record a hall's hours for `day`, unless they were already recorded today.
 */
export function mergeHours(
    document: CanonicalDocument,
    code: HallCode,
    link: string,
    day: Weekday,
    date: string,
    hours: DayHours
): boolean {
    const hall = ensureHall(document, code, link);
    if (hall.hours_collected[day] === date) return false;

    hall.hours[day] = hours;
    hall.hours_collected[day] = date;
    return true;
}

export function hasMenuFor(document: CanonicalDocument, code: HallCode, date: string): boolean {
    return document.halls[code]?.menu[date] !== undefined;
}

export function mergeDayMenu(
    document: CanonicalDocument,
    code: HallCode,
    link: string,
    date: string,
    menu: DayMenu
): boolean {
    const hall = ensureHall(document, code, link);
    if (hall.menu[date] !== undefined) return false;

    hall.menu[date] = menu;
    return true;
}

export function hasItem(document: CanonicalDocument, itemId: string): boolean {
    return Object.prototype.hasOwnProperty.call(document.items, itemId);
}

export function mergeItem(document: CanonicalDocument, itemId: string, item: ItemRecord): boolean {
    if (hasItem(document, itemId)) return false;

    document.items[itemId] = item;
    return true;
}

/**
 * Replace the week marker and fold in the new week's schedules. Locations
 * missing from the new week keep their previous entries.
 */
export function mergeTruckWeek(
    document: CanonicalDocument,
    weekOf: string,
    schedules: Record<string, TruckRecord>
): boolean {
    if (document.trucks.week_of === weekOf) return false;

    document.trucks.week_of = weekOf;
    for (const [location, days] of Object.entries(schedules)) {
        document.trucks.locations[location] = {
            ...document.trucks.locations[location],
            ...days,
        };
    }
    return true;
}
