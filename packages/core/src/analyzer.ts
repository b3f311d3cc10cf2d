import {
    assertPenalty,
    createDefaultDetectors,
    RECOMMENDED_MIN_LENGTH,
    type Finding,
    type PatternDetector,
    type PenaltyWeights,
} from "./detectors";
import {
    effectiveAlphabetSize,
    entropyBits,
    estimateCrackTime,
    profileCharacters,
    type CharacterProfile,
} from "./entropy";
import { AnalysisError } from "./errors";
import { checkPolicy, type Policy, type PolicyVerdict } from "./policy";
import {
    applyPenalties,
    baseScore,
    DEFAULT_SCORING,
    labelFor,
    validateBands,
    type ScoreBand,
    type ScoringConfig,
    type StrengthLabel,
} from "./scoring";

export interface StrengthReport {
    /** Code points in the password. */
    length: number;
    entropy: number;
    alphabetSize: number;
    score: number;
    label: StrengthLabel;
    weaknesses: Finding[];
    categories: CharacterProfile;
    feedback: string[];
    crackTime: string;
    policy?: PolicyVerdict;
}

export interface AnalyzerOptions {
    scoring?: {
        targetEntropy?: number;
        penalties?: Partial<PenaltyWeights>;
        bands?: readonly ScoreBand[];
    };
    /** Appended after the built-in detectors. */
    detectors?: readonly PatternDetector[];
}

export interface Analyzer {
    analyze(password: string | null | undefined, policy?: Policy): StrengthReport;
}

const REPETITION_KINDS = new Set(["repeat", "repeated-block", "low-variety"]);
const PATTERN_KINDS = new Set(["sequence", "keyboard", "date"]);

const buildFeedback = (profile: CharacterProfile, weaknesses: readonly Finding[]): string[] => {
    const feedback: string[] = [];
    const kinds = new Set(weaknesses.map((finding) => finding.kind));

    if (profile.length < RECOMMENDED_MIN_LENGTH) {
        feedback.push(`Use at least ${RECOMMENDED_MIN_LENGTH} characters`);
    } else if (profile.length < 12) {
        feedback.push("Consider using 12 or more characters");
    }

    if (profile.lowercase === 0) feedback.push("Add lowercase letters");
    if (profile.uppercase === 0) feedback.push("Add uppercase letters");
    if (profile.digits === 0) feedback.push("Add numbers");
    if (profile.symbols === 0 && profile.other === 0) feedback.push("Add special characters");

    if (kinds.has("common-token")) feedback.push("Avoid common passwords and words");
    if ([...kinds].some((kind) => PATTERN_KINDS.has(kind))) feedback.push("Avoid predictable patterns");
    if ([...kinds].some((kind) => REPETITION_KINDS.has(kind))) feedback.push("Reduce character repetition");

    if (feedback.length === 0) feedback.push("No obvious weaknesses found");
    return feedback;
};

/**
 * Builds an analyzer with its own scoring weights and detector list.
 * The returned function keeps no state between calls.
 */
export const createAnalyzer = (options: AnalyzerOptions = {}): Analyzer => {
    const scoring: ScoringConfig = {
        targetEntropy: options.scoring?.targetEntropy ?? DEFAULT_SCORING.targetEntropy,
        penalties: { ...DEFAULT_SCORING.penalties, ...options.scoring?.penalties },
        bands: options.scoring?.bands ?? DEFAULT_SCORING.bands,
    };
    if (!(scoring.targetEntropy > 0)) {
        throw new RangeError("targetEntropy must be greater than 0");
    }
    validateBands(scoring.bands);

    const detectors = [...createDefaultDetectors(scoring.penalties), ...(options.detectors ?? [])];
    for (const detector of detectors) {
        assertPenalty(detector.kind, detector.penalty);
    }

    return {
        analyze: (password, policy) => {
            if (typeof password !== "string") {
                throw new AnalysisError("Password must be a string");
            }

            const profile = profileCharacters(password);
            const alphabetSize = effectiveAlphabetSize(profile);
            const entropy = entropyBits(profile.length, alphabetSize);

            const weaknesses: Finding[] = [];
            for (const detector of detectors) {
                const finding = detector.detect(password);
                if (finding) {
                    assertPenalty(finding.kind, finding.penalty);
                    weaknesses.push(finding);
                }
            }

            const score = profile.length === 0 ? 0 : applyPenalties(baseScore(entropy, scoring.targetEntropy), weaknesses);

            const report: StrengthReport = {
                length: profile.length,
                entropy,
                alphabetSize,
                score,
                label: labelFor(score, scoring.bands),
                weaknesses,
                categories: profile,
                feedback: buildFeedback(profile, weaknesses),
                crackTime: estimateCrackTime(entropy),
            };

            if (policy) {
                const totalPenalty = weaknesses.reduce((sum, finding) => sum + finding.penalty, 0);
                report.policy = checkPolicy(password, policy, totalPenalty);
            }

            return report;
        },
    };
};

const defaultAnalyzer = createAnalyzer();

/**
 * Scores a password and lists its weaknesses. A weak password is a result,
 * not an error; only a missing password throws.
 *
 * @throws AnalysisError if `password` is null or undefined
 */
export const analyze = (password: string | null | undefined, policy?: Policy): StrengthReport =>
    defaultAnalyzer.analyze(password, policy);
