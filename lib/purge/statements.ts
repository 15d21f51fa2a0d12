import { sql, type SQL } from "drizzle-orm";
import { PriceField, PriceKey } from "@/lib/db/schema";

/**
 * SQL for the purge, built with drizzle's `sql` tag.
 * Tables go through sql.identifier; symbols are always bound parameters.
 */

const symbolColumn = sql.identifier(PriceKey.symbol);
const dateColumn = sql.identifier(PriceKey.date);
const closeColumn = sql.identifier(PriceField.close);
const volumeColumn = sql.identifier(PriceField.volume);

function symbolList(symbols: readonly string[]): SQL {
    return sql.join(symbols.map((symbol) => sql`${symbol}`), sql`, `);
}

export function tableExistsStatement(table: string): SQL {
    return sql`SELECT to_regclass(${table}) IS NOT NULL AS "exists"`;
}

// Keeps the (symbol, date) key so re-runs can skip rows already archived.
export function createBackupTableStatement(sourceTable: string, backupTable: string): SQL {
    return sql`CREATE TABLE IF NOT EXISTS ${sql.identifier(backupTable)} (LIKE ${sql.identifier(sourceTable)} INCLUDING DEFAULTS INCLUDING CONSTRAINTS INCLUDING INDEXES)`;
}

export function countBySymbolsStatement(table: string, symbols: readonly string[]): SQL {
    return sql`SELECT count(*)::int AS "count" FROM ${sql.identifier(table)} WHERE ${symbolColumn} IN (${symbolList(symbols)})`;
}

export function copyToBackupStatement(sourceTable: string, backupTable: string, symbols: readonly string[]): SQL {
    return sql`INSERT INTO ${sql.identifier(backupTable)} SELECT * FROM ${sql.identifier(sourceTable)} WHERE ${symbolColumn} IN (${symbolList(symbols)}) ON CONFLICT DO NOTHING`;
}

export function countMissingFromBackupStatement(sourceTable: string, backupTable: string, symbols: readonly string[]): SQL {
    const source = sql.identifier("s");
    const backup = sql.identifier("b");
    return sql`SELECT count(*)::int AS "count" FROM ${sql.identifier(sourceTable)} AS ${source} WHERE ${source}.${symbolColumn} IN (${symbolList(symbols)}) AND NOT EXISTS (SELECT 1 FROM ${sql.identifier(backupTable)} AS ${backup} WHERE ${backup}.${symbolColumn} = ${source}.${symbolColumn} AND ${backup}.${dateColumn} = ${source}.${dateColumn})`;
}

export function deleteBySymbolsStatement(table: string, symbols: readonly string[]): SQL {
    return sql`DELETE FROM ${sql.identifier(table)} WHERE ${symbolColumn} IN (${symbolList(symbols)})`;
}

export function tableStatsStatement(table: string): SQL {
    return sql`SELECT count(*)::int AS "remainingRecords", count(DISTINCT ${symbolColumn})::int AS "remainingSecurities" FROM ${sql.identifier(table)}`;
}

// date is cast to text so the driver does not turn it into a local-time Date.
export function recentPricesStatement(table: string, tradingDays: number): SQL {
    const source = sql.identifier(table);
    return sql`SELECT ${symbolColumn} AS "symbol", ${dateColumn}::text AS "date", ${closeColumn}::float8 AS "close", coalesce(${volumeColumn}, 0)::float8 AS "volume" FROM ${source} WHERE ${dateColumn} IN (SELECT DISTINCT ${dateColumn} FROM ${source} ORDER BY ${dateColumn} DESC LIMIT ${tradingDays}) AND ${closeColumn} IS NOT NULL ORDER BY ${symbolColumn}, ${dateColumn}`;
}
