import { describe, expect, it } from "vitest";
import { applyPenalties, baseScore, labelFor, validateBands } from "../src/scoring";

describe("labelFor", () => {
    it.each([
        [0, "Very Weak"],
        [20, "Very Weak"],
        [21, "Weak"],
        [40, "Weak"],
        [41, "Fair"],
        [60, "Fair"],
        [61, "Strong"],
        [80, "Strong"],
        [81, "Very Strong"],
        [100, "Very Strong"],
    ])("maps %i to %s", (score, label) => {
        expect(labelFor(score)).toBe(label);
    });
});

describe("score arithmetic", () => {
    it("normalises entropy against the target and clamps", () => {
        expect(baseScore(40, 80)).toBe(50);
        expect(baseScore(200, 80)).toBe(100);
        expect(baseScore(0, 80)).toBe(0);
    });

    it("subtracts penalties without going below zero", () => {
        const finding = (penalty: number) => ({ kind: "test", description: "test", penalty });
        expect(applyPenalties(50, [finding(15), finding(10)])).toBe(25);
        expect(applyPenalties(20, [finding(30)])).toBe(0);
    });
});

describe("validateBands", () => {
    it("rejects bands out of order", () => {
        expect(() =>
            validateBands([
                { min: 0, label: "Very Weak" },
                { min: 50, label: "Fair" },
                { min: 40, label: "Strong" },
            ])
        ).toThrow("Score bands must be in strictly ascending order");
    });

    it("rejects labels that do not get stronger", () => {
        expect(() =>
            validateBands([
                { min: 0, label: "Very Strong" },
                { min: 50, label: "Very Weak" },
            ])
        ).toThrow('Score band "Very Weak" must be stronger than "Very Strong"');
        expect(() =>
            validateBands([
                { min: 0, label: "Weak" },
                { min: 50, label: "Weak" },
            ])
        ).toThrow(RangeError);
    });

    it("accepts a subset of labels in order", () => {
        expect(() =>
            validateBands([
                { min: 0, label: "Weak" },
                { min: 70, label: "Strong" },
            ])
        ).not.toThrow();
    });

    it("rejects bands starting above 100", () => {
        expect(() =>
            validateBands([
                { min: 0, label: "Very Weak" },
                { min: 101, label: "Very Strong" },
            ])
        ).toThrow(RangeError);
    });
});

