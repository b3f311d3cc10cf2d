export type ErrorCode = "CONFIG_ERROR" | "GENERATION_ERROR" | "ANALYSIS_ERROR";

export class KeysmithError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** The generation config can never produce a password. Raised before any random draw. */
export class ConfigError extends KeysmithError {
    constructor(message: string) {
        super("CONFIG_ERROR", message);
    }
}

/** Every attempt in the retry budget failed the configured minimums. */
export class GenerationError extends KeysmithError {
    readonly attempts: number;

    constructor(message: string, attempts: number) {
        super("GENERATION_ERROR", message);
        this.attempts = attempts;
    }
}

export class AnalysisError extends KeysmithError {
    constructor(message: string) {
        super("ANALYSIS_ERROR", message);
    }
}

export const isKeysmithError = (error: unknown): error is KeysmithError => error instanceof KeysmithError;
