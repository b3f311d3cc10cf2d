import type { CategoryName } from "./charsets";

export type CharacterClass = CategoryName | "other";

/**
 * Pool size assumed for each class when estimating the alphabet an attacker
 * would have to search. `symbols` is printable ASCII punctuation; `other`
 * covers everything outside ASCII.
 */
export const CLASS_POOL_SIZES: Readonly<Record<CharacterClass, number>> = {
    lowercase: 26,
    uppercase: 26,
    digits: 10,
    symbols: 32,
    other: 100,
};

export const CHARACTER_CLASSES: readonly CharacterClass[] = ["lowercase", "uppercase", "digits", "symbols", "other"];

export interface CharacterProfile extends Record<CharacterClass, number> {
    /** Number of code points. */
    length: number;
    unique: number;
}

const GUESSES_PER_SECOND = 1e9;
const SECONDS_PER_YEAR = 365 * 24 * 3600;

export const classifyCharacter = (char: string): CharacterClass => {
    if (char >= "a" && char <= "z") return "lowercase";
    if (char >= "A" && char <= "Z") return "uppercase";
    if (char >= "0" && char <= "9") return "digits";
    const code = char.codePointAt(0) ?? 0;
    return code < 0x80 ? "symbols" : "other";
};

export const profileCharacters = (password: string): CharacterProfile => {
    const chars = Array.from(password);
    const profile: CharacterProfile = {
        lowercase: 0,
        uppercase: 0,
        digits: 0,
        symbols: 0,
        other: 0,
        length: chars.length,
        unique: new Set(chars).size,
    };
    for (const char of chars) {
        profile[classifyCharacter(char)] += 1;
    }
    return profile;
};

export const classesPresent = (profile: CharacterProfile): CharacterClass[] =>
    CHARACTER_CLASSES.filter((cls) => profile[cls] > 0);

/** Sum of the pool sizes of every class the password draws from. */
export const effectiveAlphabetSize = (profile: CharacterProfile): number =>
    classesPresent(profile).reduce((size, cls) => size + CLASS_POOL_SIZES[cls], 0);

/**
 * length × log2(alphabet), rounded to two decimals. Zero for an empty
 * password or alphabet.
 */
export const entropyBits = (length: number, alphabetSize: number): number => {
    if (length === 0 || alphabetSize === 0) return 0;
    return Math.round(length * Math.log2(alphabetSize) * 100) / 100;
};

/**
 * Average brute-force time at one billion guesses per second, worked out in
 * log space so very high entropies do not overflow.
 */
export const estimateCrackTime = (entropy: number): string => {
    if (entropy <= 0) return "instant";

    const log10Seconds = entropy * Math.log10(2) - Math.log10(2 * GUESSES_PER_SECOND);
    const log10Years = log10Seconds - Math.log10(SECONDS_PER_YEAR);

    if (log10Years > 6) {
        const exponent = Math.floor(log10Years);
        const mantissa = Math.pow(10, log10Years - exponent);
        return `${mantissa.toFixed(2)}e+${exponent} years`;
    }

    const seconds = Math.pow(10, log10Seconds);
    if (seconds > SECONDS_PER_YEAR) return `${Math.round(seconds / SECONDS_PER_YEAR)} years`;
    if (seconds > 86400) return `${Math.round(seconds / 86400)} days`;
    if (seconds > 3600) return `${Math.round(seconds / 3600)} hours`;
    if (seconds > 60) return `${Math.round(seconds / 60)} minutes`;
    return `${Math.round(seconds)} seconds`;
};
