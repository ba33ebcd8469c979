import { Response } from "express";
import { ResponseError } from "@/utils/errors";

const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const isObjectId = (value: unknown): value is string =>
    typeof value === "string" && OBJECT_ID_PATTERN.test(value);

export const optionalString = (value: unknown): string | undefined =>
    typeof value === "string" && value.trim() ? value.trim() : undefined;

export const badRequest = (res: Response, message: string): void => {
    res.status(400).json({ ok: false, message });
};

export const sendError = (res: Response, error: unknown, fallbackMessage: string): void => {
    if (error instanceof ResponseError) {
        res.status(error.statusCode).json({ ok: false, message: error.message });
        return;
    }
    console.error(`${fallbackMessage}:`, error);
    res.status(500).json({ ok: false, message: fallbackMessage });
};
