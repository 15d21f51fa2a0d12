import { EmptySymbolSetError, RemovalLogError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { PriceArchiveStore } from "@/lib/purge/price-archive.repository";
import { loadDelistedSecurities, type DelistedSecurity } from "@/lib/purge/validation-report";
import { distinctSymbols, type PurgeCliOptions } from "@/lib/validation/purge";
import { renderCleanupScript, writeCleanupScript } from "./cleanup-script.service";
import { PurgeService, PurgeState, type PurgeResult } from "./purge.service";
import type { RemovalEntry, RemovalLogService } from "./removal-log.service";

export const MANUAL_PURGE_REASON = "Manual purge";

export interface PurgeCommandSettings {
    sourceTable: string;
    backupTable: string;
    /** Report read by a bare --from-report. */
    validationReportPath: string;
}

export interface PurgeCommandDeps {
    /** Called only when rows are actually purged, never for --emit-sql. */
    openStore: () => Promise<PriceArchiveStore>;
    removalLog: RemovalLogService;
    loadReport?: (path: string) => Promise<DelistedSecurity[]>;
}

export type PurgeCommandOutcome =
    | { kind: "script"; script: string; path: string | null; symbols: string[] }
    | { kind: "purge"; result: PurgeResult; logged: RemovalEntry[] };

/**
 * Everything `scripts/purge-delisted.ts` does after parsing its arguments:
 * collect the symbols, then either render the cleanup script or run the
 * purge and record the removals.
 */
export async function runPurgeCommand(
    options: PurgeCliOptions,
    settings: PurgeCommandSettings,
    deps: PurgeCommandDeps,
    now: Date = new Date()
): Promise<PurgeCommandOutcome> {
    const sourceTable = options.sourceTable ?? settings.sourceTable;
    const backupTable = options.backupTable ?? settings.backupTable;

    let reported: DelistedSecurity[] = [];
    if (options.fromReport !== undefined) {
        const reportPath = options.fromReport === true ? settings.validationReportPath : options.fromReport;
        reported = await (deps.loadReport ?? loadDelistedSecurities)(reportPath);
        logger.info({ reportPath, delisted: reported.length }, "Loaded delisted securities from validation report");
    }

    const symbols = distinctSymbols([...options.symbols, ...reported.map((security) => security.symbol)]);
    if (symbols.length === 0) {
        throw new EmptySymbolSetError();
    }

    if (options.emitSql !== undefined) {
        const request = { sourceTable, backupTable, symbols, confirmed: options.confirmed, generatedAt: now };
        if (options.emitSql === true) {
            return { kind: "script", script: renderCleanupScript(request), path: null, symbols };
        }
        const script = await writeCleanupScript(options.emitSql, request);
        return { kind: "script", script, path: options.emitSql, symbols };
    }

    const store = await deps.openStore();
    const result = await new PurgeService(store).purge({
        sourceTable,
        backupTable,
        symbols,
        confirmed: options.confirmed,
        invocationTime: now,
    });

    if (result.state !== PurgeState.PURGED) {
        return { kind: "purge", result, logged: [] };
    }

    const bySymbol = new Map(reported.map((security) => [security.symbol, security]));
    try {
        const logged = await deps.removalLog.record(
            result.symbols.map((symbol) => ({
                symbol,
                reason: bySymbol.get(symbol)?.reason ?? MANUAL_PURGE_REASON,
                lastPrice: bySymbol.get(symbol)?.lastPrice ?? null,
                backupTable,
            })),
            result.invocationTime
        );
        return { kind: "purge", result, logged };
    } catch (error) {
        logger.error({ err: error, backupTable, symbols: result.symbols }, "Removal log update failed after commit");
        throw new RemovalLogError(backupTable, error);
    }
}
