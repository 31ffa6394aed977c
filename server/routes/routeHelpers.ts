import type { Request, Response } from "express";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { toHttpError } from "../errors";
import { logger } from "../logger";

/**
 * Maps a thrown error to the response. Validation and domain errors carry
 * their own status; anything else is logged and answered with the fallback.
 */
export function sendRouteError(req: Request, res: Response, error: unknown, fallbackMessage: string): Response {
    if (error instanceof z.ZodError) {
        return res.status(400).json({ message: fromZodError(error).message });
    }

    const mapped = toHttpError(error, fallbackMessage);
    if (mapped.status >= 500) {
        logger.withRequest(req).error(fallbackMessage, { error });
    }
    return res.status(mapped.status).json(mapped.code ? { message: mapped.message, code: mapped.code } : { message: mapped.message });
}
