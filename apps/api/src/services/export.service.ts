import { analyze, EXPORT_FORMATS, serialize, type ExportEntry } from "@keysmith/core";
import { childLogger } from "../lib/logger";
import type { ExportBody } from "../schemas/export.schema";

const log = childLogger("export-service");

export interface ExportFile {
    body: string;
    mimeType: string;
    filename: string;
}

export const buildExport = ({ format, passwords, analyze: withReports }: ExportBody): ExportFile => {
    const entries: ExportEntry[] = passwords.map((password) =>
        withReports ? { password, report: analyze(password) } : { password }
    );
    const { extension, mimeType } = EXPORT_FORMATS[format];

    log.info({ format, count: entries.length }, "exported passwords");
    return { body: serialize(format, entries), mimeType, filename: `passwords${extension}` };
};
