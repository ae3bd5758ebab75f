import type { Response } from "express";
import { errorMessage, PersistenceError } from "../errors";

const DATA_HEADERS = {
    "Cache-Control": "public, max-age=3600",
    "Access-Control-Allow-Methods": "GET,OPTIONS",
};

export function sendData(res: Response, data: unknown, statusCode = 200): void {
    res.status(statusCode).set(DATA_HEADERS).json(data);
}

export function sendError(res: Response, statusCode: number, message: string): void {
    res.status(statusCode).json({ error: { message, statusCode } });
}

/**
 * Map a failure while reading dining data to a response: the store being
 * unavailable is a 503, anything else a 500.
 */
export function sendReadFailure(res: Response, error: unknown, context: string): void {
    console.error(`Error in ${context}:`, errorMessage(error));
    if (error instanceof PersistenceError) {
        sendError(res, 503, "Dining data is not available yet");
        return;
    }
    sendError(res, 500, "Internal server error");
}
