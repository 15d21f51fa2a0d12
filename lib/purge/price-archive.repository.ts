/**
 * Price Archive Repository
 *
 * Storage boundary of the delisted-securities purge: everything the purge
 * needs from the database, behind one interface so the service can run
 * against PostgreSQL in production and an in-process store in tests.
 *
 * @module lib/purge/price-archive.repository
 */

import type { SQL } from "drizzle-orm";
import type { Database } from "@/lib/db";
import {
    copyToBackupStatement,
    countBySymbolsStatement,
    countMissingFromBackupStatement,
    createBackupTableStatement,
    deleteBySymbolsStatement,
    recentPricesStatement,
    tableExistsStatement,
    tableStatsStatement,
} from "./statements";

export interface TableStats {
    remainingRecords: number;
    remainingSecurities: number;
}

export interface PriceArchiveSession {
    tableExists(table: string): Promise<boolean>;
    /** Returns true when this call created the backup table. */
    ensureBackupTable(sourceTable: string, backupTable: string): Promise<boolean>;
    countBySymbols(table: string, symbols: readonly string[]): Promise<number>;
    /** Returns the number of rows inserted; rows already archived are skipped. */
    copyToBackup(sourceTable: string, backupTable: string, symbols: readonly string[]): Promise<number>;
    /** Matching source rows with no (symbol, date) counterpart in the backup. */
    countMissingFromBackup(sourceTable: string, backupTable: string, symbols: readonly string[]): Promise<number>;
    deleteBySymbols(table: string, symbols: readonly string[]): Promise<number>;
    tableStats(table: string): Promise<TableStats>;
}

export interface RecentPrice {
    symbol: string;
    date: string;
    close: number;
    volume: number;
}

/** Read side used by stale-price detection. */
export interface PriceHistoryReader {
    tableExists(table: string): Promise<boolean>;
    /** Rows of the latest `tradingDays` distinct dates with a close, ordered by symbol then date. */
    recentPrices(table: string, tradingDays: number): Promise<RecentPrice[]>;
}

export interface PriceArchiveStore extends PriceArchiveSession {
    /** Runs `work` atomically: any thrown error rolls every statement back. */
    transaction<T>(work: (session: PriceArchiveSession) => Promise<T>): Promise<T>;
}

/** The slice of a drizzle database or transaction the repository uses. */
export interface SqlExecutor {
    execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

// count(*) is cast to int in SQL; bigint and numeric columns would still arrive as strings.
function toNumber(value: unknown): number {
    if (typeof value === "number") return value;
    if (typeof value === "string" && value.trim() !== "") return Number(value);
    return 0;
}

export class PostgresPriceArchiveSession implements PriceArchiveSession, PriceHistoryReader {
    constructor(protected readonly executor: SqlExecutor) {}

    async tableExists(table: string): Promise<boolean> {
        const result = await this.executor.execute(tableExistsStatement(table));
        return result.rows[0]?.exists === true;
    }

    async ensureBackupTable(sourceTable: string, backupTable: string): Promise<boolean> {
        const existed = await this.tableExists(backupTable);
        if (existed) return false;
        await this.executor.execute(createBackupTableStatement(sourceTable, backupTable));
        return true;
    }

    async countBySymbols(table: string, symbols: readonly string[]): Promise<number> {
        return this.count(countBySymbolsStatement(table, symbols));
    }

    async copyToBackup(sourceTable: string, backupTable: string, symbols: readonly string[]): Promise<number> {
        const result = await this.executor.execute(copyToBackupStatement(sourceTable, backupTable, symbols));
        return result.rowCount ?? 0;
    }

    async countMissingFromBackup(sourceTable: string, backupTable: string, symbols: readonly string[]): Promise<number> {
        return this.count(countMissingFromBackupStatement(sourceTable, backupTable, symbols));
    }

    async deleteBySymbols(table: string, symbols: readonly string[]): Promise<number> {
        const result = await this.executor.execute(deleteBySymbolsStatement(table, symbols));
        return result.rowCount ?? 0;
    }

    async tableStats(table: string): Promise<TableStats> {
        const result = await this.executor.execute(tableStatsStatement(table));
        const row = result.rows[0];
        return {
            remainingRecords: toNumber(row?.remainingRecords),
            remainingSecurities: toNumber(row?.remainingSecurities),
        };
    }

    async recentPrices(table: string, tradingDays: number): Promise<RecentPrice[]> {
        const result = await this.executor.execute(recentPricesStatement(table, tradingDays));
        return result.rows.flatMap((row): RecentPrice[] => {
            const { symbol, date } = row;
            if (typeof symbol !== "string" || typeof date !== "string") return [];
            return [{ symbol, date, close: toNumber(row.close), volume: toNumber(row.volume) }];
        });
    }

    private async count(statement: SQL): Promise<number> {
        const result = await this.executor.execute(statement);
        return toNumber(result.rows[0]?.count);
    }
}

export class PostgresPriceArchiveStore extends PostgresPriceArchiveSession implements PriceArchiveStore {
    constructor(private readonly database: Database) {
        super(database);
    }

    async transaction<T>(work: (session: PriceArchiveSession) => Promise<T>): Promise<T> {
        return this.database.transaction(async (tx) => work(new PostgresPriceArchiveSession(tx)));
    }
}
