import commonTokens from "./data/common-tokens.json";
import { classesPresent, profileCharacters, type CharacterClass } from "./entropy";

export type WeaknessKind =
    | "sequence"
    | "keyboard"
    | "repeat"
    | "repeated-block"
    | "common-token"
    | "single-category"
    | "short"
    | "date"
    | "low-variety";

export interface Finding {
    kind: string;
    description: string;
    penalty: number;
}

/**
 * A single weakness check. Detectors are independent of one another and
 * report at most one finding for their kind.
 */
export interface PatternDetector {
    readonly kind: string;
    readonly penalty: number;
    detect(password: string): Finding | null;
}

export type PenaltyWeights = Record<WeaknessKind, number>;

export const DEFAULT_PENALTIES: Readonly<PenaltyWeights> = {
    sequence: 15,
    keyboard: 15,
    repeat: 15,
    "repeated-block": 10,
    "common-token": 30,
    "single-category": 10,
    short: 20,
    date: 10,
    "low-variety": 10,
};

export const RECOMMENDED_MIN_LENGTH = 8;
export const SINGLE_CATEGORY_MIN_LENGTH = 4;
const MIN_RUN = 3;
const LOW_VARIETY_MIN_LENGTH = 6;

const KEYBOARD_ROWS = ["qwertyuiop", "asdfghjkl", "zxcvbnm"];
const KEYBOARD_PATHS = [...KEYBOARD_ROWS, ...KEYBOARD_ROWS.map((row) => Array.from(row).reverse().join(""))];

// Longest first so "administrator" is reported instead of "admin".
const WEAK_TOKENS: readonly string[] = [...commonTokens].sort((a, b) => b.length - a.length);

const CLASS_NAMES: Record<CharacterClass, string> = {
    lowercase: "lowercase letters",
    uppercase: "uppercase letters",
    digits: "digits",
    symbols: "symbols",
    other: "non-ASCII characters",
};

/** Scores are whole numbers, so every penalty must be one too. */
export const assertPenalty = (kind: string, penalty: number): void => {
    if (!Number.isInteger(penalty) || penalty < 0) {
        throw new RangeError(`Penalty for ${kind} must be a non-negative integer, got ${penalty}`);
    }
};

/**
 * Builds a detector from a function that returns a description when the
 * weakness is present.
 */
export const defineDetector = (
    kind: string,
    penalty: number,
    find: (password: string) => string | null
): PatternDetector => {
    assertPenalty(kind, penalty);
    return {
        kind,
        penalty,
        detect: (password) => {
            const description = find(password);
            return description === null ? null : { kind, description, penalty };
        },
    };
};

const isLetter = (char: string) => char >= "a" && char <= "z";
const isDigit = (char: string) => char >= "0" && char <= "9";

const isSequenceStep = (from: string, to: string, step: number) =>
    ((isLetter(from) && isLetter(to)) || (isDigit(from) && isDigit(to))) &&
    (to.codePointAt(0) ?? 0) - (from.codePointAt(0) ?? 0) === step;

/** Alphabetic or numeric runs such as "abc" or "4321", ignoring case. */
const findSequence = (password: string): string | null => {
    const chars = Array.from(password);
    const lower = chars.map((char) => char.toLowerCase());

    for (let start = 0; start + MIN_RUN <= lower.length; start++) {
        for (const step of [1, -1]) {
            let end = start;
            while (end + 1 < lower.length && isSequenceStep(lower[end], lower[end + 1], step)) end++;
            if (end - start + 1 >= MIN_RUN) {
                return `Sequential characters "${chars.slice(start, end + 1).join("")}"`;
            }
        }
    }
    return null;
};

const findKeyboardRun = (password: string): string | null => {
    const chars = Array.from(password);
    const lower = chars.map((char) => char.toLowerCase());
    const onPath = (run: string) => KEYBOARD_PATHS.some((path) => path.includes(run));

    for (let start = 0; start + MIN_RUN <= lower.length; start++) {
        let end = start + 1;
        while (end < lower.length && onPath(lower.slice(start, end + 1).join(""))) end++;
        if (end - start >= MIN_RUN) {
            return `Keyboard pattern "${chars.slice(start, end).join("")}"`;
        }
    }
    return null;
};

const findRepeat = (password: string): string | null => {
    const chars = Array.from(password);
    let start = 0;
    for (let i = 1; i <= chars.length; i++) {
        if (i < chars.length && chars[i] === chars[start]) continue;
        if (i - start >= MIN_RUN) {
            return `Character "${chars[start]}" repeated ${i - start} times in a row`;
        }
        start = i;
    }
    return null;
};

// Blocks made of one character are left to the repeat detector. Reports the
// earliest block, and the shortest one at that position.
const findRepeatedBlock = (password: string): string | null => {
    const chars = Array.from(password);
    const n = chars.length;

    // runEnd[i]: last index of the run of identical characters starting at i
    const runEnd = new Array<number>(n);
    for (let i = n - 1; i >= 0; i--) {
        runEnd[i] = i + 1 < n && chars[i + 1] === chars[i] ? runEnd[i + 1] : i;
    }

    let best: { start: number; size: number } | null = null;
    for (let size = 2; size * 2 <= n; size++) {
        // matched: consecutive positions ending at i where chars[k] === chars[k + size]
        let matched = 0;
        for (let i = 0; i + size < n; i++) {
            matched = chars[i] === chars[i + size] ? matched + 1 : 0;
            if (matched < size) continue;

            const start = i - size + 1;
            if (best !== null && start >= best.start) break;
            if (runEnd[start] < start + size - 1) {
                best = { start, size };
                break;
            }
        }
    }

    if (best === null) return null;
    return `Block "${chars.slice(best.start, best.start + best.size).join("")}" repeated back-to-back`;
};

const findCommonToken = (password: string): string | null => {
    const lower = password.toLowerCase();
    const token = WEAK_TOKENS.find((candidate) => lower.includes(candidate));
    return token === undefined ? null : `Contains common weak token "${token}"`;
};

const findSingleCategory = (password: string): string | null => {
    const profile = profileCharacters(password);
    const present = classesPresent(profile);
    if (profile.length < SINGLE_CATEGORY_MIN_LENGTH || present.length !== 1) return null;
    return `Uses only ${CLASS_NAMES[present[0]]}`;
};

const findShort = (password: string): string | null => {
    const length = Array.from(password).length;
    return length < RECOMMENDED_MIN_LENGTH ? `Shorter than ${RECOMMENDED_MIN_LENGTH} characters` : null;
};

const DATE_PATTERN = /(?:19|20)\d{2}|\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}/;

const findDate = (password: string): string | null =>
    DATE_PATTERN.test(password) ? "Contains a date or year" : null;

const findLowVariety = (password: string): string | null => {
    const { length, unique } = profileCharacters(password);
    if (length < LOW_VARIETY_MIN_LENGTH || unique * 2 >= length) return null;
    return `Only ${unique} distinct characters in ${length}`;
};

/**
 * The built-in detectors in report order. Weights default to
 * {@link DEFAULT_PENALTIES}.
 */
export const createDefaultDetectors = (penalties: Readonly<PenaltyWeights> = DEFAULT_PENALTIES): PatternDetector[] => [
    defineDetector("short", penalties.short, findShort),
    defineDetector("common-token", penalties["common-token"], findCommonToken),
    defineDetector("sequence", penalties.sequence, findSequence),
    defineDetector("keyboard", penalties.keyboard, findKeyboardRun),
    defineDetector("repeat", penalties.repeat, findRepeat),
    defineDetector("repeated-block", penalties["repeated-block"], findRepeatedBlock),
    defineDetector("single-category", penalties["single-category"], findSingleCategory),
    defineDetector("date", penalties.date, findDate),
    defineDetector("low-variety", penalties["low-variety"], findLowVariety),
];
