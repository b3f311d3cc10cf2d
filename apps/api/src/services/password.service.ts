import { analyze, generate, generatePassphrase, type StrengthReport } from "@keysmith/core";
import { childLogger } from "../lib/logger";
import type { GenerateBody, PassphraseBody } from "../schemas/password.schema";
import { resolvePolicy } from "./analysis.service";

const log = childLogger("password-service");

export interface GenerateResult {
    passwords: string[];
    reports?: StrengthReport[];
}

export const generatePasswords = (body: GenerateBody): GenerateResult => {
    const { analyze: withReports, policy, preset, ...config } = body;
    const passwords = generate(config);
    log.info({ count: passwords.length, length: config.length }, "generated passwords");

    const resolved = resolvePolicy(policy, preset);
    if (!withReports && !resolved) {
        return { passwords };
    }
    return { passwords, reports: passwords.map((password) => analyze(password, resolved)) };
};

export const createPassphrase = (body: PassphraseBody): string => {
    const passphrase = generatePassphrase(body);
    log.info({ wordCount: body.wordCount ?? 4 }, "generated passphrase");
    return passphrase;
};
