import { CATEGORY_NAMES, CHARACTER_SETS, SIMILAR_CHARACTERS, dedupe, isCategoryName, type CategoryName } from "./charsets";
import { ConfigError, GenerationError } from "./errors";
import { randomIndex, secureRandom, type RandomSource } from "./random";

export const MAX_PASSWORD_LENGTH = 1000;
export const MAX_BATCH_SIZE = 10000;
export const DEFAULT_MAX_ATTEMPTS = 1000;

/** Minimums can be set for a built-in category or for the custom inclusion string. */
export type MinimumKey = CategoryName | "custom";

const isMinimumKey = (key: string): key is MinimumKey => key === "custom" || isCategoryName(key);

export interface GenerationConfig {
    length: number;
    categories: readonly CategoryName[];
    /** Extra characters added to the alphabet. */
    include?: string;
    /** Characters removed from the alphabet after everything else is added. */
    exclude?: string;
    excludeSimilar?: boolean;
    minimums?: Partial<Record<MinimumKey, number>>;
    /** Shorthand for a minimum of 1 on every enabled category. */
    requireEveryCategory?: boolean;
    noRepeatedAdjacent?: boolean;
    /** Number of passwords to produce. Defaults to 1. */
    count?: number;
}

export interface GenerateOptions {
    random?: RandomSource;
    maxAttempts?: number;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
    length: 16,
    categories: CATEGORY_NAMES,
};

interface Requirement {
    key: MinimumKey;
    minimum: number;
    members: ReadonlySet<string>;
}

interface GenerationPlan {
    alphabet: readonly string[];
    requirements: readonly Requirement[];
    length: number;
    count: number;
    noRepeatedAdjacent: boolean;
}

/**
 * Assembles the sampling alphabet: enabled categories, then the custom
 * inclusion string, minus exclusions, deduplicated in first-seen order.
 */
export const buildAlphabet = (config: Pick<GenerationConfig, "categories" | "include" | "exclude" | "excludeSimilar">): string => {
    let pool = config.categories.map((category) => CHARACTER_SETS[category]).join("");
    pool += config.include ?? "";

    const excluded = new Set(config.exclude ?? "");
    if (config.excludeSimilar) {
        for (const char of SIMILAR_CHARACTERS) excluded.add(char);
    }

    return dedupe(Array.from(pool).filter((char) => !excluded.has(char)).join(""));
};

const requirePositiveInteger = (value: number, name: string, max: number) => {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${name} must be a positive integer`);
    }
    if (value > max) {
        throw new ConfigError(`${name} cannot exceed ${max}`);
    }
};

const collectMinimums = (config: GenerationConfig): Map<MinimumKey, number> => {
    const minimums = new Map<MinimumKey, number>();

    for (const [key, value] of Object.entries(config.minimums ?? {})) {
        if (value === undefined) continue;
        if (!Number.isInteger(value) || value < 0) {
            throw new ConfigError(`Minimum for ${key} must be a non-negative integer`);
        }
        if (!isMinimumKey(key)) {
            throw new ConfigError(`Unknown character category for minimum: ${key}`);
        }
        if (value > 0) minimums.set(key, value);
    }

    if (config.requireEveryCategory) {
        for (const category of config.categories) {
            minimums.set(category, Math.max(minimums.get(category) ?? 0, 1));
        }
    }

    return minimums;
};

/**
 * Validates the config and resolves everything sampling needs.
 * Every ConfigError is raised here, before the first random draw.
 */
const planGeneration = (config: GenerationConfig): GenerationPlan => {
    requirePositiveInteger(config.length, "Password length", MAX_PASSWORD_LENGTH);
    const count = config.count ?? 1;
    requirePositiveInteger(count, "Password count", MAX_BATCH_SIZE);

    if (config.categories.length === 0 && !config.include) {
        throw new ConfigError("At least one character category must be selected or custom characters provided");
    }

    const alphabet = Array.from(buildAlphabet(config));
    if (alphabet.length === 0) {
        throw new ConfigError("Exclusions leave no characters to generate from");
    }

    const requirements: Requirement[] = [];
    let required = 0;
    for (const [key, minimum] of collectMinimums(config)) {
        const source = key === "custom" ? config.include ?? "" : CHARACTER_SETS[key];
        const members = new Set(Array.from(source).filter((char) => alphabet.includes(char)));
        if (members.size === 0) {
            throw new ConfigError(`At least ${minimum} ${key} character(s) required, but none remain in the alphabet`);
        }
        requirements.push({ key, minimum, members });
        required += minimum;
    }

    if (alphabet.length < requirements.length) {
        throw new ConfigError(
            `Alphabet has ${alphabet.length} character(s) but ${requirements.length} categories have minimums`
        );
    }
    if (required > config.length) {
        throw new ConfigError(`Character minimums add up to ${required}, more than the length of ${config.length}`);
    }

    const noRepeatedAdjacent = config.noRepeatedAdjacent ?? false;
    if (noRepeatedAdjacent && config.length > 1 && alphabet.length < 2) {
        throw new ConfigError("Avoiding repeated adjacent characters needs at least 2 characters in the alphabet");
    }

    return { alphabet, requirements, length: config.length, count, noRepeatedAdjacent };
};

/**
 * One unconstrained draw. With `noRepeatedAdjacent`, each position after the
 * first is drawn uniformly from the alphabet without the previous character.
 */
const drawCandidate = (plan: GenerationPlan, random: RandomSource): string[] => {
    const { alphabet } = plan;
    const chars: string[] = [];
    let previous = -1;

    for (let i = 0; i < plan.length; i++) {
        let index: number;
        if (plan.noRepeatedAdjacent && previous >= 0) {
            index = randomIndex(random, alphabet.length - 1);
            if (index >= previous) index += 1;
        } else {
            index = randomIndex(random, alphabet.length);
        }
        chars.push(alphabet[index]);
        previous = index;
    }

    return chars;
};

const meetsMinimums = (chars: readonly string[], requirements: readonly Requirement[]): boolean =>
    requirements.every(({ minimum, members }) => {
        let found = 0;
        for (const char of chars) {
            if (members.has(char) && ++found >= minimum) return true;
        }
        return false;
    });

const drawPassword = (plan: GenerationPlan, random: RandomSource, maxAttempts: number): string => {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const chars = drawCandidate(plan, random);
        if (meetsMinimums(chars, plan.requirements)) {
            return chars.join("");
        }
    }
    throw new GenerationError(
        `Could not satisfy character minimums within ${maxAttempts} attempts; relax the configuration and retry`,
        maxAttempts
    );
};

const resolveOptions = (options: GenerateOptions) => {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new ConfigError("maxAttempts must be a positive integer");
    }
    return { random: options.random ?? secureRandom, maxAttempts };
};

/**
 * Generates `config.count` passwords (default 1).
 *
 * Candidates that miss a minimum are discarded whole and redrawn, so the
 * output is uniform over the strings that satisfy the config.
 *
 * @throws ConfigError if the config can never be satisfied
 * @throws GenerationError if the retry budget runs out
 */
export const generate = (config: GenerationConfig, options: GenerateOptions = {}): string[] => {
    const { random, maxAttempts } = resolveOptions(options);
    const plan = planGeneration(config);

    const passwords: string[] = [];
    for (let i = 0; i < plan.count; i++) {
        passwords.push(drawPassword(plan, random, maxAttempts));
    }
    return passwords;
};

export const generatePassword = (config: GenerationConfig, options: GenerateOptions = {}): string =>
    generate({ ...config, count: 1 }, options)[0];
