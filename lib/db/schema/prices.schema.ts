import { pgTable, text, date, numeric, bigint, index, primaryKey } from 'drizzle-orm/pg-core';

// Fresh builders per table: the backup mirrors daily_prices column for column.
const priceColumns = () => ({
    symbol: text('symbol').notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    open: numeric('open', { precision: 14, scale: 4 }),
    high: numeric('high', { precision: 14, scale: 4 }),
    low: numeric('low', { precision: 14, scale: 4 }),
    close: numeric('close', { precision: 14, scale: 4 }),
    volume: bigint('volume', { mode: 'number' }),
});

// ═══════════════════════════════════════════════════════════
// 📈 DAILY PRICES TABLE
// ═══════════════════════════════════════════════════════════
export const dailyPrices = pgTable('daily_prices', priceColumns(), (t) => {
    return {
        pk: primaryKey({ columns: [t.symbol, t.date] }),
        idxSymbol: index('idxDailyPricesSymbol').on(t.symbol),
    }
});

// ═══════════════════════════════════════════════════════════
// 🗄️ DELETED SECURITIES BACKUP
// Created lazily by the purge (CREATE TABLE ... LIKE daily_prices);
// declared here so migrations and typed reads agree on its shape.
// ═══════════════════════════════════════════════════════════
export const deletedSecuritiesBackup = pgTable('deleted_securities_backup', priceColumns(), (t) => {
    return {
        pk: primaryKey({ columns: [t.symbol, t.date] }),
    }
});

/** Columns the purge filters and verifies on. */
export const PriceKey = {
    symbol: dailyPrices.symbol.name,
    date: dailyPrices.date.name,
} as const;

/** Columns read by stale-price detection. */
export const PriceField = {
    close: dailyPrices.close.name,
    volume: dailyPrices.volume.name,
} as const;
