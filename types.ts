export const HALL_CODES = [
    "b-plate",
    "de-neve",
    "epic-covel",
    "epic-ackerman",
    "drey",
    "study",
    "rende",
    "b-cafe",
    "cafe-1919",
    "feast",
] as const;

export type HallCode = (typeof HALL_CODES)[number];

export const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const MEAL_PERIODS = ["breakfast", "lunch", "dinner", "ext_dinner"] as const;

export type MealPeriod = (typeof MEAL_PERIODS)[number];

export type DayHours = Record<MealPeriod, string>;

/** Section name -> ordered item ids */
export type MenuSections = Record<string, string[]>;

export interface ClosedDayMenu {
    open: false;
}

export interface OpenDayMenu {
    open: true;
    /** Meal key ("breakfast", "lunch", "dinner") -> sections */
    meals: Record<string, MenuSections>;
}

export type DayMenu = ClosedDayMenu | OpenDayMenu;

export interface HallRecord {
    link: string;
    hours: Partial<Record<Weekday, DayHours>>;
    /** ISO date on which each weekday's hours were recorded */
    hours_collected: Partial<Record<Weekday, string>>;
    /** ISO date -> menu for that day */
    menu: Record<string, DayMenu>;
}

export const EVENING_SLOT = "5 p.m. – 8:30 p.m.";
export const LATE_NIGHT_SLOT = "10 p.m. – 12 a.m.";

export type TruckSlots = Record<typeof EVENING_SLOT | typeof LATE_NIGHT_SLOT, string>;

export type TruckRecord = Partial<Record<Weekday, TruckSlots>>;

export interface TruckSchedule {
    week_of: string | null;
    locations: Record<string, TruckRecord>;
}

/** [value text, percent daily value] */
export type NutrientValue = [string, string | null];

export interface StandardItem {
    kind: "standard";
    name: string;
    labels: string[];
    serving_size: string | null;
    calories: string | null;
    nutrients: Record<string, NutrientValue>;
}

export interface CompositeItem {
    kind: "composite";
    name: string;
    /** Group label -> ordered ingredient item ids */
    ingredients: Record<string, string[]>;
}

export type ItemRecord = StandardItem | CompositeItem;

export interface CanonicalDocument {
    halls: Partial<Record<HallCode, HallRecord>>;
    trucks: TruckSchedule;
    items: Record<string, ItemRecord>;
    last_updated: string | null;
}

export interface HallSource {
    code: HallCode;
    name: string;
    menuUrl: string;
    activityUrl: string;
}

export interface GymSource {
    code: string;
    facilityName: string;
}

export interface DiningSources {
    halls: HallSource[];
    /** Visible location name in the hours table -> hall code */
    aliases: Map<string, HallCode>;
    gyms: GymSource[];
}

export function isHallCode(value: string): value is HallCode {
    return HALL_CODES.some((code) => code === value);
}

export function isWeekday(value: string): value is Weekday {
    return WEEKDAYS.some((day) => day === value);
}
