import { DEFAULT_PENALTIES, type Finding, type PenaltyWeights } from "./detectors";

export type StrengthLabel = "Very Weak" | "Weak" | "Fair" | "Strong" | "Very Strong";

/** Weakest first. */
export const STRENGTH_LABELS: readonly StrengthLabel[] = ["Very Weak", "Weak", "Fair", "Strong", "Very Strong"];

export interface ScoreBand {
    /** Lowest score, inclusive, that earns this label. */
    min: number;
    label: StrengthLabel;
}

export interface ScoringConfig {
    /** Entropy, in bits, that earns a full base score of 100. */
    targetEntropy: number;
    penalties: PenaltyWeights;
    /** Ascending by `min`; the first band must start at 0. */
    bands: readonly ScoreBand[];
}

/*
 * Cut points:
 *   0–20   Very Weak
 *   21–40  Weak
 *   41–60  Fair
 *   61–80  Strong
 *   81–100 Very Strong
 */
export const DEFAULT_SCORE_BANDS: readonly ScoreBand[] = [
    { min: 0, label: "Very Weak" },
    { min: 21, label: "Weak" },
    { min: 41, label: "Fair" },
    { min: 61, label: "Strong" },
    { min: 81, label: "Very Strong" },
];

export const DEFAULT_SCORING: Readonly<ScoringConfig> = {
    targetEntropy: 80,
    penalties: { ...DEFAULT_PENALTIES },
    bands: DEFAULT_SCORE_BANDS,
};

const clamp = (value: number) => Math.min(100, Math.max(0, value));

/** Negative when `a` is weaker than `b`. */
const compareLabels = (a: StrengthLabel, b: StrengthLabel): number =>
    STRENGTH_LABELS.indexOf(a) - STRENGTH_LABELS.indexOf(b);

/**
 * Throws if the bands do not cover 0–100 without gaps or overlaps, or if
 * their labels do not get stronger from one band to the next.
 * Bands are contiguous by construction once they are strictly ascending
 * from 0, since each one runs up to the next band's `min` - 1.
 */
export const validateBands = (bands: readonly ScoreBand[]): void => {
    if (bands.length === 0 || bands[0].min !== 0) {
        throw new RangeError("Score bands must start at 0");
    }
    bands.forEach((band, i) => {
        if (!Number.isInteger(band.min) || band.min > 100) {
            throw new RangeError(`Score band "${band.label}" must start at an integer between 0 and 100`);
        }
        if (i > 0 && band.min <= bands[i - 1].min) {
            throw new RangeError("Score bands must be in strictly ascending order");
        }
        if (i > 0 && compareLabels(band.label, bands[i - 1].label) <= 0) {
            throw new RangeError(`Score band "${band.label}" must be stronger than "${bands[i - 1].label}"`);
        }
    });
};

export const baseScore = (entropy: number, targetEntropy: number): number =>
    clamp(Math.round((entropy / targetEntropy) * 100));

export const applyPenalties = (base: number, findings: readonly Finding[]): number =>
    clamp(findings.reduce((score, finding) => score - finding.penalty, base));

export const labelFor = (score: number, bands: readonly ScoreBand[] = DEFAULT_SCORE_BANDS): StrengthLabel => {
    let label = bands[0].label;
    for (const band of bands) {
        if (score >= band.min) label = band.label;
    }
    return label;
};
