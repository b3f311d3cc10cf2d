import { DEFAULT_GENERATION_CONFIG } from "@keysmith/core";
import { z } from "zod";

export const MAX_PASSWORD_INPUT = 1024;
/** Upper bound on the characters one request may generate or analyze. */
export const MAX_REQUEST_CHARACTERS = 200_000;

export const categorySchema = z.enum(["lowercase", "uppercase", "digits", "symbols"]);

export const policySchema = z
    .object({
        minLength: z.number().int().min(0),
        maxLength: z.number().int().positive().optional(),
        required: z.array(categorySchema).optional(),
        forbidden: z.array(z.string().min(1)).optional(),
        maxPenalty: z.number().min(0).optional(),
    })
    .strict();

export const presetSchema = z.enum(["basic", "medium", "strict"]);

const minimumsSchema = z
    .object({
        lowercase: z.number().optional(),
        uppercase: z.number().optional(),
        digits: z.number().optional(),
        symbols: z.number().optional(),
        custom: z.number().optional(),
    })
    .strict();

// Range checks on numbers are left to the generator so that its messages reach the client.
export const generateSchema = z
    .object({
        length: z.number().default(DEFAULT_GENERATION_CONFIG.length),
        categories: z.array(categorySchema).default(["lowercase", "uppercase", "digits", "symbols"]),
        include: z.string().optional(),
        exclude: z.string().optional(),
        excludeSimilar: z.boolean().optional(),
        minimums: minimumsSchema.optional(),
        requireEveryCategory: z.boolean().optional(),
        noRepeatedAdjacent: z.boolean().optional(),
        count: z.number().optional(),
        analyze: z.boolean().default(false),
        policy: policySchema.optional(),
        preset: presetSchema.optional(),
    })
    .strict()
    .refine((body) => !(body.policy && body.preset), { message: "Give either policy or preset, not both" })
    .refine((body) => body.length * (body.count ?? 1) <= MAX_REQUEST_CHARACTERS, {
        message: `length × count cannot exceed ${MAX_REQUEST_CHARACTERS} characters`,
        path: ["count"],
    });

export const passphraseSchema = z
    .object({
        wordCount: z.number().optional(),
        separator: z.string().max(10).optional(),
    })
    .strict();

export type GenerateBody = z.infer<typeof generateSchema>;
export type PassphraseBody = z.infer<typeof passphraseSchema>;
