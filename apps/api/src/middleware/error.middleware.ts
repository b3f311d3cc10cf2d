import { NextFunction, Request, Response } from "express";
import { AnalysisError, ConfigError, GenerationError, isKeysmithError } from "@keysmith/core";
import { ZodError } from "zod";
import { childLogger } from "../lib/logger";

const log = childLogger("errors");

export const statusForError = (error: unknown): number => {
    if (error instanceof ZodError) return 400;
    if (error instanceof ConfigError || error instanceof AnalysisError) return 400;
    if (error instanceof GenerationError) return 422;
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status;
    }
    return 500;
};

// Express recognises error handlers by arity, so `next` stays in the signature.
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);

    if (error instanceof ZodError) {
        return res.status(status).json({ error: "Invalid request body", issues: error.issues });
    }
    if (isKeysmithError(error)) {
        return res.status(status).json({ error: error.message, code: error.code });
    }
    if (status < 500) {
        // body-parser failures: malformed JSON, oversized payloads
        return res.status(status).json({ error: status === 413 ? "Request body too large" : "Malformed request body" });
    }

    log.error({ err: error, method: req.method, path: req.path }, "unhandled error");
    return res.status(500).json({ error: "Internal server error" });
};
