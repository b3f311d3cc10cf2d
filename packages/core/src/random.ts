/**
 * random.ts
 *
 * Random index selection for password generation.
 *
 * SECURITY GUARANTEES:
 * 1. The default source is the operating system CSPRNG (Node's crypto.randomFillSync),
 *    read in blocks; each word is handed out once.
 * 2. Indices are drawn with rejection sampling, so no index is favoured by modulo reduction.
 * 3. The source is passed in explicitly; the only state kept is the default source's unread pool.
 */

import { randomFillSync } from "crypto";

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Anything that can fill a buffer with uniformly distributed 32-bit words.
 * Production code uses {@link secureRandom}; tests may pass a seeded source.
 */
export interface RandomSource {
    fill(buffer: Uint32Array): void;
}

const POOL_SIZE = 1024;
const pool = new Uint32Array(POOL_SIZE);
let poolOffset = POOL_SIZE;

/** Serves words from a pool refilled by the CSPRNG {@link POOL_SIZE} words at a time. */
export const secureRandom: RandomSource = {
    fill: (buffer) => {
        for (let i = 0; i < buffer.length; i++) {
            if (poolOffset === POOL_SIZE) {
                randomFillSync(pool);
                poolOffset = 0;
            }
            buffer[i] = pool[poolOffset++];
        }
    },
};

const word = new Uint32Array(1);

/**
 * Returns an integer uniformly distributed over [0, bound).
 *
 * Words at or above the largest multiple of `bound` that fits in 32 bits are
 * thrown away and redrawn, which leaves every residue equally likely.
 *
 * @param bound - Exclusive upper limit, 1 ≤ bound ≤ 2^32.
 */
export const randomIndex = (source: RandomSource, bound: number): number => {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
        throw new RangeError(`Random bound must be an integer in [1, 2^32], got ${bound}`);
    }
    if (bound === 1) return 0;

    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (;;) {
        source.fill(word);
        if (word[0] < limit) {
            return word[0] % bound;
        }
    }
};

/**
 * Picks one element of `items` uniformly.
 */
export const randomChoice = <T>(source: RandomSource, items: readonly T[]): T => {
    if (items.length === 0) {
        throw new RangeError("Cannot choose from an empty list");
    }
    return items[randomIndex(source, items.length)];
};
