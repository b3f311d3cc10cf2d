import { NextFunction, Request, Response } from "express";
import { childLogger } from "../lib/logger";

const log = childLogger("http");

// Bodies are never logged: they carry passwords.
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();
    const { method, path } = req;

    res.on("finish", () => {
        const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
        log.info({ method, path, status: res.statusCode, durationMs: Math.round(durationMs * 100) / 100 }, "request completed");
    });

    next();
};
