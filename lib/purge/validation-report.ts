import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ReportNotFoundError } from "@/lib/errors";

// Statuses written by the security status check; anything else is kept as-is and ignored.
export const SecurityStatus = {
    DELISTED: "DELISTED",
    SUSPENDED: "SUSPENDED",
    AT_RISK: "AT_RISK",
    PENNY_STOCK: "PENNY_STOCK",
    SUSPICIOUS: "SUSPICIOUS",
    MONITOR: "MONITOR",
    ACTIVE: "ACTIVE",
    ERROR: "ERROR",
    UNKNOWN: "UNKNOWN",
} as const;

export type SecurityStatus = (typeof SecurityStatus)[keyof typeof SecurityStatus];

// Field names follow the report file written by the status check.
const ValidationResultSchema = z.object({
    symbol: z.string().min(1),
    status: z.string(),
    reason: z.string().optional(),
    last_price: z.number().nullable().optional(),
    volume: z.number().optional(),
    validation_date: z.string().optional(),
    data_source: z.string().optional(),
});

export const ValidationReportSchema = z.object({
    timestamp: z.string().optional(),
    total_validated: z.number().int().nonnegative().optional(),
    summary: z.record(z.number().int().nonnegative()).optional(),
    results: z.array(ValidationResultSchema),
});

export type ValidationResult = z.infer<typeof ValidationResultSchema>;
export type ValidationReport = z.infer<typeof ValidationReportSchema>;

export interface DelistedSecurity {
    symbol: string;
    reason: string;
    lastPrice: number | null;
}

export function parseValidationReport(json: unknown): ValidationReport {
    return ValidationReportSchema.parse(json);
}

/** DELISTED results in report order, first occurrence per symbol. */
export function selectDelisted(report: ValidationReport): DelistedSecurity[] {
    const seen = new Set<string>();
    const delisted: DelistedSecurity[] = [];

    for (const result of report.results) {
        if (result.status !== SecurityStatus.DELISTED || seen.has(result.symbol)) continue;
        seen.add(result.symbol);
        delisted.push({
            symbol: result.symbol,
            reason: result.reason ?? "Confirmed delisted",
            lastPrice: result.last_price ?? null,
        });
    }

    return delisted;
}

export async function loadDelistedSecurities(path: string): Promise<DelistedSecurity[]> {
    let raw: string;
    try {
        raw = await readFile(path, "utf8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            throw new ReportNotFoundError(path);
        }
        throw error;
    }
    return selectDelisted(parseValidationReport(JSON.parse(raw)));
}
