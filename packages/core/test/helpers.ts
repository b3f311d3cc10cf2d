import type { RandomSource } from "../src/random";

/**
 * Deterministic 32-bit generator (mulberry32). Good enough for statistical
 * tests, never for real passwords.
 */
export const seededRandom = (seed: number): RandomSource => {
    let state = seed >>> 0;
    return {
        fill: (buffer) => {
            for (let i = 0; i < buffer.length; i++) {
                state = (state + 0x6d2b79f5) >>> 0;
                let t = state;
                t = Math.imul(t ^ (t >>> 15), t | 1);
                t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
                buffer[i] = (t ^ (t >>> 14)) >>> 0;
            }
        },
    };
};

/** Hands out the given words in order and fails once they run out. */
export const scriptedRandom = (words: readonly number[]) => {
    let next = 0;
    const source: RandomSource & { consumed: () => number } = {
        fill: (buffer) => {
            for (let i = 0; i < buffer.length; i++) {
                if (next >= words.length) throw new Error("Scripted random source exhausted");
                buffer[i] = words[next++];
            }
        },
        consumed: () => next,
    };
    return source;
};

/** Always yields 0, so every draw picks the first candidate. */
export const zeroRandom: RandomSource = {
    fill: (buffer) => {
        buffer.fill(0);
    },
};
