import { Router } from "express";
import type { DocumentCache } from "../scripts/document-cache";
import { isHallCode, isWeekday, type DayMenu, type DiningSources, type HallCode, type HallRecord } from "../types";
import { isHallOpen, isIsoDate } from "../utils";
import { sendData, sendError, sendReadFailure } from "./respond";

const queryString = (value: unknown): string | undefined => (typeof value === "string" && value ? value : undefined);

/**
 * Routes over the halls section of the document:
 *
 *   GET /halls?open=true
 *   GET /halls/:hallId
 *   GET /halls/:hallId/hours?day=mon
 *   GET /halls/:hallId/menu?date=YYYY-MM-DD&meal=lunch
 *   GET /halls/:hallId/menu/:date
 */
export function createHallsRouter(
    cache: DocumentCache,
    sources: DiningSources,
    clock: () => Date = () => new Date()
): Router {
    const router = Router();

    const hallName = (code: HallCode) => sources.halls.find((hall) => hall.code === code)?.name ?? code;

    router.get("/halls", async (req, res) => {
        try {
            const { document, lastModified } = await cache.get();
            const openOnly = queryString(req.query.open) === "true";
            const now = clock();

            const halls = Object.entries(document.halls)
                .filter((entry): entry is [HallCode, HallRecord] => isHallCode(entry[0]) && entry[1] !== undefined)
                .map(([id, hall]) => ({
                    id,
                    name: hallName(id),
                    link: hall.link,
                    isOpen: isHallOpen(hall.hours, now),
                }))
                .filter((hall) => !openOnly || hall.isOpen);

            sendData(res, { halls, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, "GET /halls");
        }
    });

    router.get("/halls/:hallId", async (req, res) => {
        const { hallId } = req.params;
        if (!isHallCode(hallId)) {
            return sendError(res, 400, "Invalid hall ID");
        }

        try {
            const { document, lastModified } = await cache.get();
            const hall = document.halls[hallId];
            if (!hall) {
                return sendError(res, 404, "Hall not found");
            }

            sendData(res, {
                id: hallId,
                name: hallName(hallId),
                link: hall.link,
                hours: hall.hours,
                isOpen: isHallOpen(hall.hours, clock()),
                lastUpdated: lastModified.toISOString(),
            });
        } catch (error) {
            sendReadFailure(res, error, `GET /halls/${hallId}`);
        }
    });

    router.get("/halls/:hallId/hours", async (req, res) => {
        const { hallId } = req.params;
        if (!isHallCode(hallId)) {
            return sendError(res, 400, "Invalid hall ID");
        }

        try {
            const { document, lastModified } = await cache.get();
            const hall = document.halls[hallId];
            if (!hall) {
                return sendError(res, 404, "Hall not found");
            }

            let hours: HallRecord["hours"] = hall.hours;
            const day = queryString(req.query.day)?.toLowerCase();
            if (day) {
                const dayHours = isWeekday(day) ? hall.hours[day] : undefined;
                if (!isWeekday(day) || !dayHours) {
                    return sendError(res, 400, "Invalid day parameter");
                }
                hours = {};
                hours[day] = dayHours;
            }

            sendData(res, { hallId, hours, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, `GET /halls/${hallId}/hours`);
        }
    });

    router.get("/halls/:hallId/menu", async (req, res) => {
        const { hallId } = req.params;
        if (!isHallCode(hallId)) {
            return sendError(res, 400, "Invalid hall ID");
        }

        const date = queryString(req.query.date);
        if (date && !isIsoDate(date)) {
            return sendError(res, 400, "Invalid date format. Use YYYY-MM-DD");
        }

        try {
            const { document, lastModified } = await cache.get();
            const hall = document.halls[hallId];
            if (!hall) {
                return sendError(res, 404, "Hall not found");
            }

            let menu: Record<string, DayMenu> = hall.menu;
            if (date) {
                const dayMenu = hall.menu[date];
                if (!dayMenu) {
                    return sendError(res, 404, "Menu not found for specified date");
                }

                const meal = queryString(req.query.meal)?.toLowerCase();
                const mealSections = meal && dayMenu.open ? dayMenu.meals[meal] : undefined;
                const filtered: DayMenu = meal && mealSections ? { open: true, meals: { [meal]: mealSections } } : dayMenu;
                menu = { [date]: filtered };
            }

            sendData(res, { hallId, menu, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, `GET /halls/${hallId}/menu`);
        }
    });

    router.get("/halls/:hallId/menu/:date", async (req, res) => {
        const { hallId, date } = req.params;
        if (!isHallCode(hallId) || !isIsoDate(date)) {
            return sendError(res, 400, "Invalid hall ID or date format");
        }

        try {
            const { document, lastModified } = await cache.get();
            const dayMenu = document.halls[hallId]?.menu[date];
            if (!dayMenu) {
                return sendError(res, 404, "Menu not found");
            }

            sendData(res, { hallId, date, menu: dayMenu, lastUpdated: lastModified.toISOString() });
        } catch (error) {
            sendReadFailure(res, error, `GET /halls/${hallId}/menu/${date}`);
        }
    });

    return router;
}
