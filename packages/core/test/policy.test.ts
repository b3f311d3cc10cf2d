import { describe, expect, it } from "vitest";
import { checkPolicy, POLICY_PRESETS } from "../src/policy";

describe("checkPolicy", () => {
    it("applies the medium preset length", () => {
        expect(checkPolicy("Tr0ub4dor&3", POLICY_PRESETS.medium)).toEqual({
            passed: false,
            unmet: ["Must be at least 12 characters"],
        });
    });

    it("applies the strict preset forbidden list case-insensitively", () => {
        expect(checkPolicy("MyPassword123!xyz", POLICY_PRESETS.strict)).toEqual({
            passed: false,
            unmet: ['Must not contain "password"'],
        });
    });

    it("enforces a maximum length", () => {
        expect(checkPolicy(`${"a".repeat(70)}A1!`, POLICY_PRESETS.strict).unmet).toEqual([
            "Must be at most 64 characters",
        ]);
    });

    it("passes the basic preset without symbols", () => {
        expect(checkPolicy("Harbor42tide", POLICY_PRESETS.basic)).toEqual({ passed: true, unmet: [] });
    });

    it("ignores the penalty ceiling unless the policy sets one", () => {
        expect(checkPolicy("abcdefgh", { minLength: 8 }, 500).passed).toBe(true);
    });
});

