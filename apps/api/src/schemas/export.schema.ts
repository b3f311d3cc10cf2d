import { MAX_BATCH_SIZE } from "@keysmith/core";
import { z } from "zod";
import { MAX_PASSWORD_INPUT, MAX_REQUEST_CHARACTERS } from "./password.schema";

export const exportSchema = z
    .object({
        format: z.enum(["txt", "csv", "json"]),
        passwords: z.array(z.string().max(MAX_PASSWORD_INPUT)).min(1).max(MAX_BATCH_SIZE),
        analyze: z.boolean().default(false),
    })
    .strict()
    .refine((body) => body.passwords.reduce((total, password) => total + password.length, 0) <= MAX_REQUEST_CHARACTERS, {
        message: `Passwords cannot add up to more than ${MAX_REQUEST_CHARACTERS} characters`,
        path: ["passwords"],
    });

export type ExportBody = z.infer<typeof exportSchema>;
