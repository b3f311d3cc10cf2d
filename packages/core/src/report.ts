import type { StrengthReport } from "./analyzer";

const RULE = "=".repeat(50);

/**
 * Plain-text rendering of a strength report for terminals, logs of
 * aggregate results, or a "copy report" button. Never includes the password.
 */
export const formatReport = (report: StrengthReport): string => {
    const { categories } = report;
    const lines = [
        "PASSWORD STRENGTH ANALYSIS REPORT",
        RULE,
        "",
        `Password Length: ${report.length} characters`,
        `Overall Score: ${report.score}/100`,
        `Strength Level: ${report.label}`,
        "",
        "CHARACTER SET ANALYSIS:",
        `- Lowercase letters: ${categories.lowercase}`,
        `- Uppercase letters: ${categories.uppercase}`,
        `- Numbers: ${categories.digits}`,
        `- Special characters: ${categories.symbols}`,
        `- Other characters: ${categories.other}`,
        `- Unique characters: ${categories.unique}`,
        "",
        "SECURITY METRICS:",
        `- Entropy: ${report.entropy} bits`,
        `- Effective alphabet: ${report.alphabetSize} characters`,
        `- Time to crack (brute force): ${report.crackTime}`,
        "",
        "WEAKNESSES:",
    ];

    if (report.weaknesses.length === 0) {
        lines.push("- None detected");
    } else {
        for (const finding of report.weaknesses) {
            lines.push(`- ${finding.description} (-${finding.penalty})`);
        }
    }

    lines.push("", "RECOMMENDATIONS:");
    report.feedback.forEach((hint, i) => lines.push(`${i + 1}. ${hint}`));

    if (report.policy) {
        lines.push("", `POLICY: ${report.policy.passed ? "PASSED" : "FAILED"}`);
        for (const requirement of report.policy.unmet) {
            lines.push(`- ${requirement}`);
        }
    }

    return lines.join("\n");
};
