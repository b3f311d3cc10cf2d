import { z } from "zod";
import { MAX_PASSWORD_INPUT, policySchema, presetSchema } from "./password.schema";

export const analyzeSchema = z
    .object({
        password: z.string().max(MAX_PASSWORD_INPUT),
        policy: policySchema.optional(),
        preset: presetSchema.optional(),
    })
    .strict()
    .refine((body) => !(body.policy && body.preset), { message: "Give either policy or preset, not both" });

export type AnalyzeBody = z.infer<typeof analyzeSchema>;
