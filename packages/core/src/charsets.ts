export type CategoryName = "lowercase" | "uppercase" | "digits" | "symbols";

export const CATEGORY_NAMES: readonly CategoryName[] = ["lowercase", "uppercase", "digits", "symbols"];

export const CHARACTER_SETS: Readonly<Record<CategoryName, string>> = {
    lowercase: "abcdefghijklmnopqrstuvwxyz",
    uppercase: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
    digits: "0123456789",
    symbols: "!@#$%^&*()_+-=[]{}|;:,.<>?",
};

// Characters that are easy to misread for one another in most fonts.
export const SIMILAR_CHARACTERS = "0O1lI";

export const isCategoryName = (value: string): value is CategoryName =>
    (CATEGORY_NAMES as readonly string[]).includes(value);

/**
 * Removes repeated characters, keeping the first occurrence of each.
 * Works on code points so that surrogate pairs stay intact.
 */
export const dedupe = (chars: string): string => {
    const seen = new Set<string>();
    let out = "";
    for (const char of chars) {
        if (seen.has(char)) continue;
        seen.add(char);
        out += char;
    }
    return out;
};
