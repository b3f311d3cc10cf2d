import Papa from "papaparse";
import type { StrengthReport } from "./analyzer";

export type ExportFormat = "txt" | "csv" | "json";

export interface ExportEntry {
    password: string;
    report?: Pick<StrengthReport, "score" | "entropy" | "label">;
}

export interface ExportRow {
    password: string;
    score: number | null;
    entropy: number | null;
    label: string | null;
}

export const EXPORT_FORMATS: Readonly<Record<ExportFormat, { extension: string; mimeType: string; description: string }>> = {
    txt: { extension: ".txt", mimeType: "text/plain", description: "Text file" },
    csv: { extension: ".csv", mimeType: "text/csv", description: "CSV file" },
    json: { extension: ".json", mimeType: "application/json", description: "JSON file" },
};

export const EXPORT_COLUMNS = ["password", "score", "entropy", "label"] as const;

const toRow = ({ password, report }: ExportEntry): ExportRow => ({
    password,
    score: report?.score ?? null,
    entropy: report?.entropy ?? null,
    label: report?.label ?? null,
});

/** One password per line. */
export const toText = (entries: readonly ExportEntry[]): string =>
    entries.map((entry) => entry.password).join("\n");

/** Header row, then one quoted-as-needed row per entry. Missing reports leave empty cells. */
export const toCsv = (entries: readonly ExportEntry[]): string =>
    Papa.unparse(
        {
            fields: [...EXPORT_COLUMNS],
            data: entries.map((entry) => {
                const row = toRow(entry);
                return [row.password, row.score ?? "", row.entropy ?? "", row.label ?? ""];
            }),
        },
        { newline: "\n" }
    );

export const toJson = (entries: readonly ExportEntry[]): string => JSON.stringify(entries.map(toRow), null, 2);

export const serialize = (format: ExportFormat, entries: readonly ExportEntry[]): string => {
    switch (format) {
        case "txt":
            return toText(entries);
        case "csv":
            return toCsv(entries);
        case "json":
            return toJson(entries);
    }
};
