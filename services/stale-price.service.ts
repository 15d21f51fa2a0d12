import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { format } from "date-fns";
import { PurgeError, StorageEngineError, TableNotFoundError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { PriceHistoryReader, RecentPrice } from "@/lib/purge/price-archive.repository";
import { TableNameSchema } from "@/lib/validation/purge";

export const STALE_WINDOW_DAYS = 10;
export const MIN_HISTORY_DAYS = 5;
export const MIN_FLAT_DAYS = 3;
export const REPORT_LIMIT = 50;
const PRICE_TOLERANCE = 0.0001;
const PENNY_PRICE = 0.01;

export const RiskLevel = {
    HIGH: "HIGH",
    MEDIUM: "MEDIUM",
    LOW: "LOW",
} as const;

export type RiskLevel = (typeof RiskLevel)[keyof typeof RiskLevel];

const RISK_ORDER: Record<RiskLevel, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };

export interface StaleSecurity {
    symbol: string;
    /** Close repeated across the flat run. */
    price: number;
    consecutiveDays: number;
    avgVolume: number;
    zeroVolumeDays: number;
    riskLevel: RiskLevel;
    lastDate: string;
}

export interface StaleRecommendation {
    action: "IMMEDIATE_REVIEW" | "MONITOR" | "PENNY_STOCK_REVIEW";
    description: string;
    symbols: string[];
    priority: "HIGH" | "MEDIUM";
}

export interface StalePriceReport {
    timestamp: string;
    summary: {
        totalStale: number;
        highRisk: number;
        mediumRisk: number;
        lowRisk: number;
    };
    /** Highest risk first, then lowest volume; capped at REPORT_LIMIT. */
    securities: StaleSecurity[];
    recommendations: StaleRecommendation[];
}

interface FlatRun {
    start: number;
    length: number;
}

/** Longest run of equal closes; the earliest wins a tie. */
export function longestFlatRun(closes: readonly number[]): FlatRun {
    let best: FlatRun = { start: 0, length: closes.length > 0 ? 1 : 0 };
    let runStart = 0;

    for (let i = 1; i < closes.length; i++) {
        const previous = closes[i - 1];
        const current = closes[i];
        if (previous === undefined || current === undefined) continue;

        if (Math.abs(current - previous) < PRICE_TOLERANCE) {
            const length = i - runStart + 1;
            if (length > best.length) best = { start: runStart, length };
        } else {
            runStart = i;
        }
    }

    return best;
}

export function assessRisk(input: { zeroVolumeDays: number; avgVolume: number; price: number }): RiskLevel {
    if (input.zeroVolumeDays >= 2) return RiskLevel.HIGH;
    if (input.avgVolume < 1000) return RiskLevel.MEDIUM;
    if (input.price < PENNY_PRICE) return RiskLevel.HIGH;
    return RiskLevel.LOW;
}

/** `history` is one symbol's rows in date order. */
export function analyzeSymbol(symbol: string, history: readonly RecentPrice[]): StaleSecurity | null {
    if (history.length < MIN_HISTORY_DAYS) return null;

    const run = longestFlatRun(history.map((row) => row.close));
    if (run.length < MIN_FLAT_DAYS) return null;

    const window = history.slice(run.start, run.start + run.length);
    const volumes = window.map((row) => row.volume);
    const avgVolume = volumes.reduce((sum, volume) => sum + volume, 0) / volumes.length;
    const zeroVolumeDays = volumes.filter((volume) => volume === 0).length;
    const price = window[window.length - 1]?.close ?? 0;
    const lastDate = history[history.length - 1]?.date ?? "";

    return {
        symbol,
        price,
        consecutiveDays: run.length,
        avgVolume,
        zeroVolumeDays,
        riskLevel: assessRisk({ zeroVolumeDays, avgVolume, price }),
        lastDate,
    };
}

export function recommendCleanup(stale: readonly StaleSecurity[]): StaleRecommendation[] {
    const recommendations: StaleRecommendation[] = [];
    const high = stale.filter((security) => security.riskLevel === RiskLevel.HIGH);
    const medium = stale.filter((security) => security.riskLevel === RiskLevel.MEDIUM);
    const penny = stale.filter((security) => security.price < PENNY_PRICE);

    if (high.length > 0) {
        recommendations.push({
            action: "IMMEDIATE_REVIEW",
            description: `Review ${high.length} high-risk securities with zero/minimal volume`,
            symbols: high.slice(0, 10).map((security) => security.symbol),
            priority: "HIGH",
        });
    }
    if (medium.length > 0) {
        recommendations.push({
            action: "MONITOR",
            description: `Monitor ${medium.length} medium-risk securities for delisting`,
            symbols: medium.slice(0, 10).map((security) => security.symbol),
            priority: "MEDIUM",
        });
    }
    if (penny.length > 0) {
        recommendations.push({
            action: "PENNY_STOCK_REVIEW",
            description: `Review ${penny.length} securities under $0.01`,
            symbols: penny.map((security) => security.symbol),
            priority: "MEDIUM",
        });
    }

    return recommendations;
}

/** `rows` must be ordered by symbol, then date, as `recentPrices` returns them. */
export function buildStalePriceReport(rows: readonly RecentPrice[], now: Date): StalePriceReport {
    const bySymbol = new Map<string, RecentPrice[]>();
    for (const row of rows) {
        const history = bySymbol.get(row.symbol);
        if (history) history.push(row);
        else bySymbol.set(row.symbol, [row]);
    }

    const stale: StaleSecurity[] = [];
    for (const [symbol, history] of bySymbol) {
        const security = analyzeSymbol(symbol, history);
        if (security) stale.push(security);
    }
    stale.sort((a, b) => RISK_ORDER[a.riskLevel] - RISK_ORDER[b.riskLevel] || a.avgVolume - b.avgVolume);

    const count = (level: RiskLevel) => stale.filter((security) => security.riskLevel === level).length;

    return {
        timestamp: format(now, "yyyy-MM-dd HH:mm:ss"),
        summary: {
            totalStale: stale.length,
            highRisk: count(RiskLevel.HIGH),
            mediumRisk: count(RiskLevel.MEDIUM),
            lowRisk: count(RiskLevel.LOW),
        },
        securities: stale.slice(0, REPORT_LIMIT),
        recommendations: recommendCleanup(stale),
    };
}

/**
 * Flags securities whose close has not moved for several trading days,
 * over the latest STALE_WINDOW_DAYS dates of the price table.
 */
export class StalePriceService {
    constructor(private readonly reader: PriceHistoryReader) {}

    async detect(table: string, now: Date = new Date()): Promise<StalePriceReport> {
        const sourceTable = TableNameSchema.parse(table);

        let rows: RecentPrice[];
        try {
            if (!(await this.reader.tableExists(sourceTable))) {
                throw new TableNotFoundError(sourceTable);
            }
            rows = await this.reader.recentPrices(sourceTable, STALE_WINDOW_DAYS);
        } catch (error) {
            if (error instanceof PurgeError) throw error;
            logger.error({ err: error, sourceTable }, "StalePriceService.detect failed");
            throw new StorageEngineError("Reading recent prices failed", error);
        }

        const report = buildStalePriceReport(rows, now);
        logger.info({ sourceTable, rows: rows.length, ...report.summary }, "📊 Stale price detection finished");
        return report;
    }
}

export async function writeStalePriceReport(path: string, report: StalePriceReport): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    logger.info({ path, totalStale: report.summary.totalStale }, "Stale price report saved");
}
