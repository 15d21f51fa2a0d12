import assert from "node:assert/strict";
import test from "node:test";
import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { PostgresPriceArchiveSession, type SqlExecutor } from "./price-archive.repository.ts";

type Response = { rows: Record<string, unknown>[]; rowCount: number | null };

const dialect = new PgDialect();

/** Answers queries in order and records the SQL it was given. */
class RecordingExecutor implements SqlExecutor {
  readonly statements: string[] = [];

  constructor(private readonly responses: Response[]) {}

  async execute(query: SQL): Promise<Response> {
    this.statements.push(dialect.sqlToQuery(query).sql);
    return this.responses.shift() ?? { rows: [], rowCount: 0 };
  }
}

test("tableExists reads the exists flag", async () => {
  const session = new PostgresPriceArchiveSession(
    new RecordingExecutor([{ rows: [{ exists: true }], rowCount: 1 }, { rows: [{ exists: false }], rowCount: 1 }])
  );

  assert.equal(await session.tableExists("daily_prices"), true);
  assert.equal(await session.tableExists("missing_table"), false);
});

test("ensureBackupTable creates the table only when it is absent", async () => {
  const executor = new RecordingExecutor([
    { rows: [{ exists: false }], rowCount: 1 },
    { rows: [], rowCount: null },
    { rows: [{ exists: true }], rowCount: 1 },
  ]);
  const session = new PostgresPriceArchiveSession(executor);

  assert.equal(await session.ensureBackupTable("daily_prices", "deleted_securities_backup"), true);
  assert.equal(await session.ensureBackupTable("daily_prices", "deleted_securities_backup"), false);
  assert.equal(executor.statements.length, 3);
  assert.equal(executor.statements[1]?.startsWith('CREATE TABLE IF NOT EXISTS "deleted_securities_backup"'), true);
});

test("copyToBackup and deleteBySymbols report affected rows", async () => {
  const session = new PostgresPriceArchiveSession(
    new RecordingExecutor([
      { rows: [], rowCount: 15 },
      { rows: [], rowCount: 15 },
      { rows: [], rowCount: null },
    ])
  );

  assert.equal(await session.copyToBackup("daily_prices", "deleted_securities_backup", ["IPG", "CRCW"]), 15);
  assert.equal(await session.deleteBySymbols("daily_prices", ["IPG", "CRCW"]), 15);
  assert.equal(await session.deleteBySymbols("daily_prices", ["IPG"]), 0);
});

test("counts accept numeric strings from the driver", async () => {
  const session = new PostgresPriceArchiveSession(
    new RecordingExecutor([
      { rows: [{ count: 10 }], rowCount: 1 },
      { rows: [{ count: "3" }], rowCount: 1 },
      { rows: [], rowCount: 0 },
    ])
  );

  assert.equal(await session.countBySymbols("daily_prices", ["IPG"]), 10);
  assert.equal(await session.countMissingFromBackup("daily_prices", "deleted_securities_backup", ["IPG"]), 3);
  assert.equal(await session.countBySymbols("daily_prices", ["NOPE"]), 0);
});

test("tableStats maps the statistics row", async () => {
  const session = new PostgresPriceArchiveSession(
    new RecordingExecutor([{ rows: [{ remainingRecords: 100, remainingSecurities: "10" }], rowCount: 1 }])
  );

  assert.deepEqual(await session.tableStats("daily_prices"), { remainingRecords: 100, remainingSecurities: 10 });
});

test("recentPrices maps driver rows and skips malformed ones", async () => {
  const executor = new RecordingExecutor([
    {
      rows: [
        { symbol: "IPG", date: "2026-02-18", close: 0.0004, volume: 0 },
        { symbol: "IPG", date: "2026-02-19", close: "0.0004", volume: "1200" },
        { symbol: null, date: "2026-02-19", close: 1, volume: 1 },
      ],
      rowCount: 3,
    },
  ]);
  const session = new PostgresPriceArchiveSession(executor);

  assert.deepEqual(await session.recentPrices("daily_prices", 10), [
    { symbol: "IPG", date: "2026-02-18", close: 0.0004, volume: 0 },
    { symbol: "IPG", date: "2026-02-19", close: 0.0004, volume: 1200 },
  ]);
  assert.equal(executor.statements[0]?.includes("LIMIT $1"), true);
});
