import { describe, expect, it, vi } from "vitest";
import { CHARACTER_SETS } from "../src/charsets";
import { ConfigError, GenerationError } from "../src/errors";
import { buildAlphabet, DEFAULT_GENERATION_CONFIG, generate, generatePassword, type GenerationConfig } from "../src/generator";
import type { RandomSource } from "../src/random";
import { seededRandom, zeroRandom } from "./helpers";

// Fails the test if any draw happens.
const untouchedRandom = () => {
    const fill = vi.fn((_buffer: Uint32Array): void => {
        throw new Error("random source should not be used");
    });
    return { fill };
};

describe("buildAlphabet", () => {
    it("adds custom characters after the categories and drops duplicates", () => {
        expect(buildAlphabet({ categories: ["digits"], include: "0a0b" })).toBe("0123456789ab");
    });

    it("removes excluded characters", () => {
        expect(buildAlphabet({ categories: ["digits"], exclude: "13579" })).toBe("02468");
    });

    it("removes look-alike characters when asked", () => {
        const alphabet = buildAlphabet({ categories: ["uppercase", "digits"], excludeSimilar: true });
        expect(alphabet).toHaveLength(32);
        for (const char of "0O1I") {
            expect(alphabet).not.toContain(char);
        }
    });

    it("keeps the order categories are listed in", () => {
        expect(buildAlphabet({ categories: ["digits", "lowercase"] }).slice(8, 12)).toBe("89ab");
    });
});

describe("generate", () => {
    it("produces passwords of the configured length from the alphabet", () => {
        const passwords = generate(
            { length: 24, categories: ["lowercase", "digits"], count: 50 },
            { random: seededRandom(7) }
        );
        expect(passwords).toHaveLength(50);
        for (const password of passwords) {
            expect(password).toMatch(/^[a-z0-9]{24}$/);
        }
    });

    it("meets a digit minimum with only letters and digits", () => {
        const [password] = generate({
            length: 12,
            categories: ["lowercase", "uppercase", "digits"],
            minimums: { digits: 1 },
        });
        expect(password).toMatch(/^[A-Za-z0-9]{12}$/);
        expect(password).toMatch(/[0-9]/);
    });

    it("uses the defaults of 16 characters from every category", () => {
        const password = generatePassword(DEFAULT_GENERATION_CONFIG);
        const alphabet = Object.values(CHARACTER_SETS).join("");
        expect(Array.from(password)).toHaveLength(16);
        for (const char of password) {
            expect(alphabet).toContain(char);
        }
    });

    it("generates from custom characters alone", () => {
        const passwords = generate({ length: 10, categories: [], include: "xyz€", count: 20 }, { random: seededRandom(3) });
        for (const password of passwords) {
            expect(Array.from(password)).toHaveLength(10);
            expect(password).toMatch(/^[xyz€]+$/u);
        }
    });

    it("satisfies every configured minimum", () => {
        const passwords = generate(
            {
                length: 10,
                categories: ["lowercase", "uppercase", "digits", "symbols"],
                minimums: { uppercase: 2, digits: 3, symbols: 1 },
                count: 200,
            },
            { random: seededRandom(11) }
        );
        for (const password of passwords) {
            expect(password.replace(/[^A-Z]/g, "").length).toBeGreaterThanOrEqual(2);
            expect(password.replace(/[^0-9]/g, "").length).toBeGreaterThanOrEqual(3);
            expect(Array.from(password).some((char) => CHARACTER_SETS.symbols.includes(char))).toBe(true);
        }
    });

    it("counts custom characters toward the custom minimum", () => {
        const passwords = generate(
            { length: 6, categories: ["lowercase"], include: "€", minimums: { custom: 2 }, count: 20 },
            { random: seededRandom(5) }
        );
        for (const password of passwords) {
            expect(Array.from(password).filter((char) => char === "€").length).toBeGreaterThanOrEqual(2);
        }
    });

    it("requires each enabled category when requireEveryCategory is set", () => {
        const passwords = generate(
            { length: 8, categories: ["lowercase", "uppercase", "digits", "symbols"], requireEveryCategory: true, count: 100 },
            { random: seededRandom(19) }
        );
        for (const password of passwords) {
            expect(password).toMatch(/[a-z]/);
            expect(password).toMatch(/[A-Z]/);
            expect(password).toMatch(/[0-9]/);
            expect(password).toMatch(/[^A-Za-z0-9]/);
        }
    });

    it("never repeats adjacent characters when asked", () => {
        expect(generatePassword({ length: 6, categories: ["lowercase"], noRepeatedAdjacent: true }, { random: zeroRandom })).toBe(
            "ababab"
        );

        const passwords = generate(
            { length: 40, categories: [], include: "ab", noRepeatedAdjacent: true, count: 20 },
            { random: seededRandom(23) }
        );
        for (const password of passwords) {
            expect(password).not.toMatch(/(.)\1/);
        }
    });

    it("draws characters uniformly", () => {
        const passwords = generate({ length: 100, categories: ["digits"], count: 100 }, { random: seededRandom(2024) });
        const counts = new Map<string, number>();
        for (const char of passwords.join("")) {
            counts.set(char, (counts.get(char) ?? 0) + 1);
        }

        const expected = 10000 / 10;
        let chiSquare = 0;
        for (const digit of CHARACTER_SETS.digits) {
            const observed = counts.get(digit) ?? 0;
            chiSquare += (observed - expected) ** 2 / expected;
        }
        // 9 degrees of freedom, p = 0.001
        expect(chiSquare).toBeLessThan(27.88);
    });

    it("generates large batches from the system source quickly", () => {
        const started = performance.now();
        const passwords = generate({ length: 1000, categories: ["lowercase", "digits"], count: 200 });
        const elapsed = performance.now() - started;

        expect(passwords).toHaveLength(200);
        expect(passwords[199]).toMatch(/^[a-z0-9]{1000}$/);
        expect(elapsed).toBeLessThan(2000);
    });

    it("does not promise distinct outputs", () => {
        expect(generate({ length: 4, categories: ["digits"], count: 3 }, { random: zeroRandom })).toEqual([
            "0000",
            "0000",
            "0000",
        ]);
    });
});

describe("generate config errors", () => {
    it("fails before drawing when exclusions remove a required category", () => {
        const random = untouchedRandom();
        expect(() =>
            generate(
                { length: 12, categories: ["lowercase", "digits"], exclude: "0123456789", minimums: { digits: 1 } },
                { random }
            )
        ).toThrow(ConfigError);
        expect(random.fill).not.toHaveBeenCalled();
    });

    const invalidConfigs: Array<[string, GenerationConfig]> = [
        ["zero length", { length: 0, categories: ["lowercase"] }],
        ["fractional length", { length: 8.5, categories: ["lowercase"] }],
        ["excessive length", { length: 1001, categories: ["lowercase"] }],
        ["no categories", { length: 8, categories: [] }],
        ["empty alphabet", { length: 8, categories: ["digits"], exclude: "0123456789" }],
        ["zero count", { length: 8, categories: ["digits"], count: 0 }],
        ["excessive count", { length: 8, categories: ["digits"], count: 10001 }],
        ["minimums longer than the password", { length: 3, categories: ["digits", "lowercase"], minimums: { digits: 2, lowercase: 2 } }],
        ["negative minimum", { length: 8, categories: ["digits"], minimums: { digits: -1 } }],
        ["custom minimum without custom characters", { length: 8, categories: ["digits"], minimums: { custom: 1 } }],
        ["single character without repeats", { length: 2, categories: [], include: "x", noRepeatedAdjacent: true }],
    ];

    it.each(invalidConfigs)("rejects %s", (_name, config) => {
        const random = untouchedRandom();
        expect(() => generate(config, { random })).toThrow(ConfigError);
        expect(random.fill).not.toHaveBeenCalled();
    });

    it("rejects fewer alphabet characters than required categories", () => {
        expect(() =>
            generate({ length: 4, categories: [], include: "a", minimums: { lowercase: 1, custom: 1 } }, { random: untouchedRandom() })
        ).toThrow("Alphabet has 1 character(s) but 2 categories have minimums");
    });

    it("accepts a single character without repeats when the password is one long", () => {
        expect(generate({ length: 1, categories: [], include: "x", noRepeatedAdjacent: true })).toEqual(["x"]);
    });
});

describe("generate retry budget", () => {
    it("throws GenerationError once the budget is spent", () => {
        const random: RandomSource = { fill: vi.fn(zeroRandom.fill) };
        let caught: unknown;
        try {
            generate({ length: 10, categories: ["lowercase", "digits"], minimums: { digits: 1 } }, { random, maxAttempts: 3 });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(GenerationError);
        expect(caught).toMatchObject({ code: "GENERATION_ERROR", attempts: 3 });
        expect(random.fill).toHaveBeenCalledTimes(30);
    });

    it("rejects a non-positive budget", () => {
        expect(() => generate({ length: 4, categories: ["digits"] }, { maxAttempts: 0 })).toThrow(ConfigError);
    });
});
