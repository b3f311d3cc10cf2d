import { analyze, POLICY_PRESETS, type Policy, type PolicyPresetName, type StrengthReport } from "@keysmith/core";
import { childLogger } from "../lib/logger";
import type { AnalyzeBody } from "../schemas/analysis.schema";

const log = childLogger("analysis-service");

export const resolvePolicy = (policy?: Policy, preset?: PolicyPresetName): Policy | undefined =>
    policy ?? (preset ? POLICY_PRESETS[preset] : undefined);

export const analyzePassword = ({ password, policy, preset }: AnalyzeBody): StrengthReport => {
    const report = analyze(password, resolvePolicy(policy, preset));
    // Only the outcome is logged.
    log.info({ score: report.score, label: report.label, policyPassed: report.policy?.passed }, "analyzed password");
    return report;
};
