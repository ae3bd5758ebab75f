import { describe, it, expect } from "vitest";
import {
    compactKey,
    isHallOpen,
    isIsoDate,
    isWithinHourRange,
    isoDate,
    parseClockTime,
    resolveUrl,
    weekdayCode,
} from "../utils";
import type { DayHours } from "../types";
import { SUNDAY_NOON } from "./fixtures";

const at = (hours: number, minutes = 0) => new Date(2026, 9, 18, hours, minutes);

describe("utils", () => {
    describe("weekdayCode and isoDate", () => {
        it("should name Sunday as sun", () => {
            expect(weekdayCode(SUNDAY_NOON)).toBe("sun");
        });

        it("should name Saturday as sat", () => {
            expect(weekdayCode(new Date(2026, 9, 24))).toBe("sat");
        });

        it("should format local dates as YYYY-MM-DD", () => {
            expect(isoDate(SUNDAY_NOON)).toBe("2026-10-18");
            expect(isoDate(new Date(2026, 0, 5, 23, 59))).toBe("2026-01-05");
        });
    });

    describe("isIsoDate", () => {
        it("should accept a real calendar date", () => {
            expect(isIsoDate("2026-10-18")).toBe(true);
        });

        it("should reject dates that do not exist", () => {
            expect(isIsoDate("2026-02-30")).toBe(false);
        });

        it("should reject other formats", () => {
            expect(isIsoDate("2026-1-5")).toBe(false);
            expect(isIsoDate("10/18/2026")).toBe(false);
            expect(isIsoDate("")).toBe(false);
        });
    });

    describe("compactKey", () => {
        it("should drop whitespace and lowercase", () => {
            expect(compactKey("  Harvest  Grill\n")).toBe("harvestgrill");
            expect(compactKey("Lunch")).toBe("lunch");
        });
    });

    describe("parseClockTime", () => {
        it("should read dotted meridiems", () => {
            expect(parseClockTime("7:00 a.m.")).toBe(420);
            expect(parseClockTime("9:30 p.m.")).toBe(1290);
        });

        it("should read plain meridiems", () => {
            expect(parseClockTime("5:30 PM")).toBe(1050);
        });

        it("should treat 12 a.m. as midnight and 12 p.m. as noon", () => {
            expect(parseClockTime("12:00 a.m.")).toBe(0);
            expect(parseClockTime("12:00 p.m.")).toBe(720);
        });

        it("should return null for text that is not a time", () => {
            expect(parseClockTime("Closed")).toBeNull();
        });
    });

    describe("isWithinHourRange", () => {
        it("should include times inside the range", () => {
            expect(isWithinHourRange("11:30 a.m. - 2:00 p.m.", at(12))).toBe(true);
        });

        it("should exclude times outside the range", () => {
            expect(isWithinHourRange("7:00 a.m. - 10:00 a.m.", at(12))).toBe(false);
        });

        it("should accept an en dash between the times", () => {
            expect(isWithinHourRange("11:00 a.m. – 3:00 p.m.", at(14, 59))).toBe(true);
        });

        it("should wrap ranges that run past midnight", () => {
            expect(isWithinHourRange("9:00 p.m. - 2:00 a.m.", at(23, 30))).toBe(true);
            expect(isWithinHourRange("9:00 p.m. - 2:00 a.m.", at(1))).toBe(true);
            expect(isWithinHourRange("9:00 p.m. - 2:00 a.m.", at(12))).toBe(false);
        });

        it("should be false for a closed period", () => {
            expect(isWithinHourRange("Closed", at(12))).toBe(false);
        });
    });

    describe("isHallOpen", () => {
        const sunday: DayHours = {
            breakfast: "7:00 a.m. - 10:00 a.m.",
            lunch: "11:30 a.m. - 2:00 p.m.",
            dinner: "5:00 p.m. - 9:00 p.m.",
            ext_dinner: "Closed",
        };

        it("should be open during a listed period", () => {
            expect(isHallOpen({ sun: sunday }, SUNDAY_NOON)).toBe(true);
        });

        it("should be closed between periods", () => {
            expect(isHallOpen({ sun: sunday }, at(15))).toBe(false);
        });

        it("should be closed when today's hours are unknown", () => {
            expect(isHallOpen({ mon: sunday }, SUNDAY_NOON)).toBe(false);
        });
    });

    describe("resolveUrl", () => {
        it("should resolve a root-relative link against the site", () => {
            expect(resolveUrl("/menu-item/?recipe=12", "https://dining.example.edu")).toBe(
                "https://dining.example.edu/menu-item/?recipe=12"
            );
        });

        it("should keep an absolute link", () => {
            expect(resolveUrl("https://other.example.edu/a", "https://dining.example.edu")).toBe(
                "https://other.example.edu/a"
            );
        });
    });
});
