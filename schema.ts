import { z } from "zod";
import { EVENING_SLOT, HALL_CODES, LATE_NIGHT_SLOT, type CanonicalDocument } from "./types";

const dayHoursSchema = z.object({
    breakfast: z.string(),
    lunch: z.string(),
    dinner: z.string(),
    ext_dinner: z.string(),
});

const weekdaySchema = z.enum(["sun", "mon", "tue", "wed", "thu", "fri", "sat"]);

const dayMenuSchema = z.discriminatedUnion("open", [
    z.object({ open: z.literal(false) }),
    z.object({
        open: z.literal(true),
        meals: z.record(z.record(z.array(z.string()))),
    }),
]);

const hallRecordSchema = z.object({
    link: z.string(),
    hours: z.record(weekdaySchema, dayHoursSchema),
    hours_collected: z.record(weekdaySchema, z.string()),
    menu: z.record(dayMenuSchema),
});

const truckSlotsSchema = z.object({
    [EVENING_SLOT]: z.string(),
    [LATE_NIGHT_SLOT]: z.string(),
});

const itemRecordSchema = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("standard"),
        name: z.string(),
        labels: z.array(z.string()),
        serving_size: z.string().nullable(),
        calories: z.string().nullable(),
        nutrients: z.record(z.tuple([z.string(), z.string().nullable()])),
    }),
    z.object({
        kind: z.literal("composite"),
        name: z.string(),
        ingredients: z.record(z.array(z.string())),
    }),
]);

export const canonicalDocumentSchema = z.object({
    halls: z.record(z.enum(HALL_CODES), hallRecordSchema),
    trucks: z.object({
        week_of: z.string().nullable(),
        locations: z.record(z.record(weekdaySchema, truckSlotsSchema)),
    }),
    items: z.record(itemRecordSchema),
    last_updated: z.string().nullable(),
});

/**
 * Validate untrusted JSON (from the store) as a canonical document.
 * Returns null with the zod issues summarised in `reason` when it does not fit.
 */
export function parseCanonicalDocument(
    raw: unknown
): { document: CanonicalDocument; reason: null } | { document: null; reason: string } {
    const result = canonicalDocumentSchema.safeParse(raw);
    if (!result.success) {
        const reason = result.error.issues
            .slice(0, 3)
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        return { document: null, reason };
    }
    return { document: result.data, reason: null };
}

export const facilityCountSchema = z.array(
    z.object({
        FacilityName: z.string(),
        LocationName: z.string(),
        LastCount: z.number(),
        IsClosed: z.boolean(),
        TotalCapacity: z.number(),
    })
);

export type FacilityCount = z.infer<typeof facilityCountSchema>[number];
