import {
    distinctSymbols,
    isBlankSymbolSet,
    PurgeRequestSchema,
    type PurgeRequest,
} from "@/lib/validation/purge";
import {
    BackupIncompleteError,
    EmptySymbolSetError,
    PurgeError,
    StorageEngineError,
    TableNotFoundError,
} from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { PriceArchiveSession, PriceArchiveStore, TableStats } from "@/lib/purge/price-archive.repository";

export const PurgeState = {
    BACKED_UP: "BACKED_UP",
    PURGED: "PURGED",
} as const;

export type PurgeState = (typeof PurgeState)[keyof typeof PurgeState];

export interface PurgeResult {
    sourceTable: string;
    backupTable: string;
    symbols: string[];
    invocationTime: Date;
    state: PurgeState;
    backupCreated: boolean;
    /** Source rows matching the symbol set when the run started. */
    matched: number;
    /** Rows newly copied into the backup table by this run. */
    backedUp: number;
    deleted: number;
    /** Source table statistics after the delete; only set once PURGED. */
    remaining?: TableStats;
}

type BackupOutcome = Pick<PurgeResult, "backupCreated" | "matched" | "backedUp">;

export class PurgeService {
    constructor(private readonly store: PriceArchiveStore) {}

    /**
     * Back up every source row for the given symbols, then delete them when
     * `confirmed` is set. Both steps share one transaction: if anything fails,
     * nothing is deleted and the backup inserts are rolled back too.
     */
    async purge(request: PurgeRequest): Promise<PurgeResult> {
        if (isBlankSymbolSet(request.symbols)) {
            throw new EmptySymbolSetError();
        }

        const parsed = PurgeRequestSchema.parse(request);
        const symbols = distinctSymbols(parsed.symbols);
        const { sourceTable, backupTable, confirmed, invocationTime } = parsed;
        const startTime = Date.now();

        logger.info({ sourceTable, backupTable, symbols, confirmed }, "Starting delisted securities purge");

        try {
            if (!(await this.store.tableExists(sourceTable))) {
                throw new TableNotFoundError(sourceTable);
            }

            const result = await this.store.transaction(async (session): Promise<PurgeResult> => {
                const backup = await this.backup(session, sourceTable, backupTable, symbols);

                const base: PurgeResult = {
                    sourceTable,
                    backupTable,
                    symbols,
                    invocationTime,
                    state: PurgeState.BACKED_UP,
                    ...backup,
                    deleted: 0,
                };

                if (!confirmed) {
                    return base;
                }

                const missing = await session.countMissingFromBackup(sourceTable, backupTable, symbols);
                if (missing > 0) {
                    throw new BackupIncompleteError(backupTable, missing);
                }

                const deleted = await session.deleteBySymbols(sourceTable, symbols);
                const remaining = await session.tableStats(sourceTable);

                return { ...base, state: PurgeState.PURGED, deleted, remaining };
            });

            logger.info(
                {
                    state: result.state,
                    matched: result.matched,
                    backedUp: result.backedUp,
                    deleted: result.deleted,
                    remaining: result.remaining,
                    duration: `${Date.now() - startTime}ms`,
                },
                confirmed ? "✅ Purge completed" : "✅ Backup completed; delete skipped (not confirmed)"
            );

            return result;
        } catch (error) {
            if (error instanceof PurgeError) throw error;
            logger.error({ err: error, sourceTable, backupTable }, "PurgeService.purge failed");
            throw new StorageEngineError("Purge failed in the storage engine; no rows were deleted", error);
        }
    }

    private async backup(
        session: PriceArchiveSession,
        sourceTable: string,
        backupTable: string,
        symbols: readonly string[]
    ): Promise<BackupOutcome> {
        const backupCreated = await session.ensureBackupTable(sourceTable, backupTable);
        if (backupCreated) {
            logger.info({ backupTable, sourceTable }, "Created backup table");
        }

        const matched = await session.countBySymbols(sourceTable, symbols);
        const backedUp = await session.copyToBackup(sourceTable, backupTable, symbols);
        logger.debug({ matched, backedUp }, "Backup step finished");

        return { backupCreated, matched, backedUp };
    }
}
