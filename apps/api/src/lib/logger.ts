import pino from "pino";
import { config } from "../config";

export const logger = pino({
    name: "keysmith-api",
    level: config.logLevel,
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
        err: pino.stdSerializers.err,
    },
});

export const childLogger = (module: string) => logger.child({ module });
