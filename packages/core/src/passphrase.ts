import words from "./data/wordlist.json";
import { ConfigError } from "./errors";
import { randomChoice, randomIndex, secureRandom, type RandomSource } from "./random";

export const MAX_PASSPHRASE_WORDS = 20;
const SUFFIX_BOUND = 1000;

export interface PassphraseOptions {
    wordCount?: number;
    separator?: string;
}

const capitalize = (word: string) => word.charAt(0).toUpperCase() + word.slice(1);

/**
 * Memorable password: capitalised words from the bundled list joined by
 * `separator`, followed by a number below 1000, e.g. "Otter-Cobalt-Meadow-Fjord417".
 */
export const generatePassphrase = (options: PassphraseOptions = {}, random: RandomSource = secureRandom): string => {
    const wordCount = options.wordCount ?? 4;
    const separator = options.separator ?? "-";

    if (!Number.isInteger(wordCount) || wordCount < 1 || wordCount > MAX_PASSPHRASE_WORDS) {
        throw new ConfigError(`Word count must be an integer between 1 and ${MAX_PASSPHRASE_WORDS}`);
    }

    const picked: string[] = [];
    for (let i = 0; i < wordCount; i++) {
        picked.push(capitalize(randomChoice(random, words)));
    }

    return picked.join(separator) + String(randomIndex(random, SUFFIX_BOUND));
};
