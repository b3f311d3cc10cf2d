import rateLimit from "express-rate-limit";
import { config, type Config } from "../config";

export const createLimiter = ({ windowMs, max }: Config["rateLimit"]) =>
    rateLimit({
        windowMs,
        max,
        message: { error: "Too many requests from this device or network. Please try again shortly" },
        standardHeaders: true,
        legacyHeaders: false,
    });

// Separate budgets so a burst of analysis does not block generation.
export const generationLimiter = createLimiter(config.rateLimit);
export const analysisLimiter = createLimiter(config.rateLimit);
