import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const configSchema = z.object({
    port: z.coerce.number().int().positive().default(4000),
    host: z.string().default("0.0.0.0"),
    corsOrigins: z
        .string()
        .default("http://localhost:3000,http://127.0.0.1:3000")
        .transform((list) =>
            list
                .split(",")
                .map((origin) => origin.trim())
                .filter((origin) => origin.length > 0)
        ),
    rateLimit: z.object({
        windowMs: z.coerce.number().int().positive().default(60_000),
        max: z.coerce.number().int().positive().default(60),
    }),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Reads settings from the environment. Throws on the first invalid value so
 * the server never starts half-configured.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
    const parsed = configSchema.safeParse({
        port: env.PORT,
        host: env.HOST,
        corsOrigins: env.CORS_ORIGINS,
        rateLimit: {
            windowMs: env.RATE_LIMIT_WINDOW_MS,
            max: env.RATE_LIMIT_MAX,
        },
        logLevel: env.LOG_LEVEL,
        nodeEnv: env.NODE_ENV,
    });
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    return parsed.data;
};

export const config = loadConfig();
