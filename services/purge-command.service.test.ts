import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { EmptySymbolSetError, handleError, RemovalLogError } from "../lib/errors.ts";
import { parsePurgeArgs } from "../lib/purge/cli-args.ts";
import {
  InMemoryPriceArchiveStore,
  type PriceRow,
} from "../lib/purge/testing/in-memory-price-archive.store.ts";
import type { DelistedSecurity } from "../lib/purge/validation-report.ts";
import { runPurgeCommand, type PurgeCommandDeps } from "./purge-command.service.ts";
import { PurgeState } from "./purge.service.ts";
import { RemovalLogService } from "./removal-log.service.ts";

const SOURCE = "daily_prices";
const BACKUP = "deleted_securities_backup";
const REPORT_PATH = "data/security_validation.json";
const now = new Date(2026, 1, 19, 7, 0, 2);

const settings = { sourceTable: SOURCE, backupTable: BACKUP, validationReportPath: REPORT_PATH };

function pricesFor(symbol: string, days: number): PriceRow[] {
  return Array.from({ length: days }, (_, i) => ({
    symbol,
    date: `2026-01-${String(i + 1).padStart(2, "0")}`,
    close: 10 + i,
    volume: 5000,
  }));
}

/** Store, removal log in a temp dir, and counters for what the command touched. */
async function setup(report: DelistedSecurity[] = []) {
  const dir = await mkdtemp(join(tmpdir(), "purge-command-"));
  const store = new InMemoryPriceArchiveStore({
    [SOURCE]: [...pricesFor("IPG", 10), ...pricesFor("CRCW", 5), ...pricesFor("MODG", 3), ...pricesFor("KEEP", 10)],
  });
  const calls: { opened: number; reportPaths: string[] } = { opened: 0, reportPaths: [] };
  const logPath = join(dir, "removal_log.json");
  const deps: PurgeCommandDeps = {
    openStore: async () => {
      calls.opened += 1;
      return store;
    },
    removalLog: new RemovalLogService(logPath),
    loadReport: async (path) => {
      calls.reportPaths.push(path);
      return report;
    },
  };
  return { dir, store, calls, deps, logPath, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

test("symbols from arguments and the report are merged in order without repeats", async () => {
  const ctx = await setup([
    { symbol: "MODG", reason: "Known delisted security", lastPrice: 1.5 },
    { symbol: "CRCW", reason: "Extreme penny stock (< $0.001)", lastPrice: 0.0004 },
  ]);
  try {
    const outcome = await runPurgeCommand(
      parsePurgeArgs(["IPG", "--symbols=CRCW,IPG", "--from-report"]),
      settings,
      ctx.deps,
      now
    );

    assert.equal(outcome.kind, "purge");
    if (outcome.kind !== "purge") return;
    assert.deepEqual(outcome.result.symbols, ["IPG", "CRCW", "MODG"]);
    assert.equal(outcome.result.matched, 18);
    assert.deepEqual(ctx.calls.reportPaths, [REPORT_PATH]);
  } finally {
    await ctx.cleanup();
  }
});

test("an unconfirmed run backs up only and leaves the removal log alone", async () => {
  const ctx = await setup();
  try {
    const outcome = await runPurgeCommand(parsePurgeArgs(["IPG"]), settings, ctx.deps, now);

    assert.equal(outcome.kind, "purge");
    if (outcome.kind !== "purge") return;
    assert.equal(outcome.result.state, PurgeState.BACKED_UP);
    assert.deepEqual(outcome.logged, []);
    assert.equal(ctx.store.rows(SOURCE).length, 28);
    assert.deepEqual(await ctx.deps.removalLog.load(), { lastUpdated: null, removals: [] });
  } finally {
    await ctx.cleanup();
  }
});

test("--emit-sql renders the script without opening the database", async () => {
  const ctx = await setup();
  try {
    const outcome = await runPurgeCommand(parsePurgeArgs(["IPG", "CRCW", "--emit-sql"]), settings, ctx.deps, now);

    assert.equal(outcome.kind, "script");
    if (outcome.kind !== "script") return;
    assert.equal(outcome.path, null);
    assert.deepEqual(outcome.symbols, ["IPG", "CRCW"]);
    assert.equal(outcome.script.split("\n")[1], "-- Generated: 2026-02-19 07:00:02");
    assert.equal(ctx.calls.opened, 0);
    assert.equal(ctx.store.transactions, 0);
  } finally {
    await ctx.cleanup();
  }
});

test("--emit-sql with a path writes the script to that file", async () => {
  const ctx = await setup();
  try {
    const path = join(ctx.dir, "out", "cleanup_script.sql");
    const outcome = await runPurgeCommand(parsePurgeArgs(["IPG", `--emit-sql=${path}`, "--yes"]), settings, ctx.deps, now);

    assert.equal(outcome.kind, "script");
    if (outcome.kind !== "script") return;
    assert.equal(outcome.path, path);
    assert.equal(await readFile(path, "utf8"), outcome.script);
    assert.equal(ctx.calls.opened, 0);
  } finally {
    await ctx.cleanup();
  }
});

test("a confirmed purge records removals with report reasons and a manual fallback", async () => {
  const ctx = await setup([{ symbol: "CRCW", reason: "Known delisted security", lastPrice: 0.0004 }]);
  try {
    const outcome = await runPurgeCommand(parsePurgeArgs(["IPG", "--from-report", "--yes"]), settings, ctx.deps, now);

    assert.equal(outcome.kind, "purge");
    if (outcome.kind !== "purge") return;
    assert.equal(outcome.result.state, PurgeState.PURGED);
    assert.equal(outcome.result.deleted, 15);
    assert.deepEqual(outcome.logged, [
      {
        symbol: "IPG",
        date: "2026-02-19",
        reason: "Manual purge",
        status: "DELISTED",
        lastPrice: null,
        backupTable: BACKUP,
      },
      {
        symbol: "CRCW",
        date: "2026-02-19",
        reason: "Known delisted security",
        status: "DELISTED",
        lastPrice: 0.0004,
        backupTable: BACKUP,
      },
    ]);
    const log = await ctx.deps.removalLog.load();
    assert.equal(log.lastUpdated, "2026-02-19 07:00:02");
    assert.deepEqual(log.removals.map((entry) => entry.symbol), ["IPG", "CRCW"]);
  } finally {
    await ctx.cleanup();
  }
});

test("an unreadable removal log after the delete reports the committed purge", async () => {
  const ctx = await setup();
  try {
    await writeFile(ctx.logPath, "{ not json", "utf8");

    await assert.rejects(
      runPurgeCommand(parsePurgeArgs(["IPG", "--yes"]), settings, ctx.deps, now),
      (error: unknown) => {
        assert.ok(error instanceof RemovalLogError);
        assert.equal(error.backupTable, BACKUP);
        const report = handleError(error);
        assert.equal(report.code, "REMOVAL_LOG_FAILED");
        assert.equal(report.exitCode, 7);
        assert.equal(
          report.message.startsWith(`Purge committed (rows are archived in "${BACKUP}")`),
          true
        );
        return true;
      }
    );

    assert.equal(ctx.store.rows(SOURCE).some((row) => row.symbol === "IPG"), false);
    assert.equal(ctx.store.rows(BACKUP).length, 10);
  } finally {
    await ctx.cleanup();
  }
});

test("a removal log with an unexpected shape is reported the same way", async () => {
  const ctx = await setup();
  try {
    await writeFile(ctx.logPath, JSON.stringify({ removals: "nope" }), "utf8");

    await assert.rejects(
      runPurgeCommand(parsePurgeArgs(["CRCW", "--yes"]), settings, ctx.deps, now),
      RemovalLogError
    );
    assert.equal(ctx.store.rows(BACKUP).length, 5);
  } finally {
    await ctx.cleanup();
  }
});

test("no symbols at all fails before the database is opened", async () => {
  const ctx = await setup();
  try {
    await assert.rejects(runPurgeCommand(parsePurgeArgs(["--yes"]), settings, ctx.deps, now), EmptySymbolSetError);
    await assert.rejects(
      runPurgeCommand(parsePurgeArgs(["--from-report", "--yes"]), settings, ctx.deps, now),
      EmptySymbolSetError
    );
    assert.equal(ctx.calls.opened, 0);
  } finally {
    await ctx.cleanup();
  }
});
