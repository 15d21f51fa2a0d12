import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { format } from "date-fns";
import { logger } from "@/lib/logger";
import { SecurityStatus, type ValidationReport } from "@/lib/purge/validation-report";
import type { StaleSecurity } from "./stale-price.service";

const PENNY_STOCK_THRESHOLD = 0.05;
const EXTREME_PENNY_PRICE = 0.001;
const LOW_VOLUME = 10_000;

export interface SecurityClassification {
    symbol: string;
    status: SecurityStatus;
    reason: string;
    last_price: number;
    volume: number;
    validation_date: string;
    data_source: string;
}

/**
 * Heuristic status of a stale-priced security. Rules are checked in order;
 * the first that matches decides the status.
 */
export function classifySecurity(
    security: StaleSecurity,
    knownDelisted: ReadonlySet<string>,
    now: Date
): SecurityClassification {
    const base = {
        symbol: security.symbol,
        last_price: security.price,
        volume: security.avgVolume,
        validation_date: format(now, "yyyy-MM-dd HH:mm"),
    };

    if (knownDelisted.has(security.symbol)) {
        return { ...base, status: SecurityStatus.DELISTED, reason: "Known delisted security", data_source: "Known List" };
    }
    if (security.zeroVolumeDays >= 5) {
        return {
            ...base,
            status: SecurityStatus.SUSPENDED,
            reason: `${security.zeroVolumeDays} days with zero volume`,
            data_source: "Volume Analysis",
        };
    }
    if (security.price < EXTREME_PENNY_PRICE) {
        return {
            ...base,
            status: SecurityStatus.DELISTED,
            reason: "Extreme penny stock (< $0.001)",
            data_source: "Price Analysis",
        };
    }
    if (security.price < PENNY_STOCK_THRESHOLD && security.avgVolume < LOW_VOLUME) {
        return {
            ...base,
            status: SecurityStatus.AT_RISK,
            reason: `Penny stock with low volume ($${security.price.toFixed(4)})`,
            data_source: "Risk Analysis",
        };
    }
    if (security.consecutiveDays >= 10) {
        return {
            ...base,
            status: SecurityStatus.SUSPICIOUS,
            reason: `${security.consecutiveDays} days same price`,
            data_source: "Pattern Analysis",
        };
    }
    return { ...base, status: SecurityStatus.MONITOR, reason: "Stale price but appears active", data_source: "Heuristic" };
}

export function buildValidationReport(
    securities: readonly StaleSecurity[],
    knownDelisted: Iterable<string>,
    now: Date
): ValidationReport {
    const known = new Set(knownDelisted);
    const results = securities.map((security) => classifySecurity(security, known, now));

    const summary: Record<string, number> = {};
    for (const result of results) {
        summary[result.status] = (summary[result.status] ?? 0) + 1;
    }

    return {
        timestamp: format(now, "yyyy-MM-dd HH:mm:ss"),
        total_validated: results.length,
        summary,
        results,
    };
}

export async function writeValidationReport(path: string, report: ValidationReport): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    logger.info({ path, summary: report.summary }, "Security validation report saved");
}
