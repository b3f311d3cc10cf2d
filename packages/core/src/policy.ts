import type { CategoryName } from "./charsets";
import { profileCharacters } from "./entropy";

export interface Policy {
    minLength: number;
    maxLength?: number;
    required?: readonly CategoryName[];
    /** Matched case-insensitively as substrings. */
    forbidden?: readonly string[];
    /** Upper bound on the summed penalty of every weakness found. */
    maxPenalty?: number;
}

export interface PolicyVerdict {
    passed: boolean;
    unmet: string[];
}

export type PolicyPresetName = "basic" | "medium" | "strict";

export const POLICY_PRESETS: Readonly<Record<PolicyPresetName, Policy>> = {
    basic: {
        minLength: 8,
        maxLength: 128,
        required: ["uppercase", "lowercase", "digits"],
    },
    medium: {
        minLength: 12,
        maxLength: 128,
        required: ["uppercase", "lowercase", "digits", "symbols"],
    },
    strict: {
        minLength: 16,
        maxLength: 64,
        required: ["uppercase", "lowercase", "digits", "symbols"],
        forbidden: ["password", "123456", "qwerty", "admin"],
    },
};

const REQUIREMENT_NAMES: Record<CategoryName, string> = {
    lowercase: "lowercase letters",
    uppercase: "uppercase letters",
    digits: "numbers",
    symbols: "special characters",
};

/**
 * Checks every rule of the policy and lists each one the password misses.
 * `totalPenalty` is only consulted when the policy sets `maxPenalty`.
 */
export const checkPolicy = (password: string, policy: Policy, totalPenalty = 0): PolicyVerdict => {
    const profile = profileCharacters(password);
    const unmet: string[] = [];

    if (profile.length < policy.minLength) {
        unmet.push(`Must be at least ${policy.minLength} characters`);
    }
    if (policy.maxLength !== undefined && profile.length > policy.maxLength) {
        unmet.push(`Must be at most ${policy.maxLength} characters`);
    }

    for (const category of policy.required ?? []) {
        if (profile[category] === 0) {
            unmet.push(`Must contain ${REQUIREMENT_NAMES[category]}`);
        }
    }

    const lower = password.toLowerCase();
    for (const token of policy.forbidden ?? []) {
        if (token && lower.includes(token.toLowerCase())) {
            unmet.push(`Must not contain "${token}"`);
        }
    }

    if (policy.maxPenalty !== undefined && totalPenalty > policy.maxPenalty) {
        unmet.push(`Weakness penalties total ${totalPenalty}, above the allowed ${policy.maxPenalty}`);
    }

    return { passed: unmet.length === 0, unmet };
};
