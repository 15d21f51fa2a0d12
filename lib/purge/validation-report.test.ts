import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { ZodError } from "zod";
import { ReportNotFoundError } from "../errors.ts";
import {
  loadDelistedSecurities,
  parseValidationReport,
  selectDelisted,
} from "./validation-report.ts";

const report = {
  timestamp: "2026-02-19 06:55:10",
  total_validated: 5,
  results: [
    { symbol: "IPG", status: "DELISTED", reason: "Known delisted security", last_price: 0.0004 },
    { symbol: "ZNGA", status: "SUSPENDED", reason: "6 days with zero volume", last_price: 1.2 },
    { symbol: "CRCW", status: "DELISTED", last_price: null },
    { symbol: "IPG", status: "DELISTED", reason: "repeated row" },
    { symbol: "ABCD", status: "MONITOR" },
  ],
};

test("selectDelisted keeps DELISTED results in report order", () => {
  assert.deepEqual(selectDelisted(parseValidationReport(report)), [
    { symbol: "IPG", reason: "Known delisted security", lastPrice: 0.0004 },
    { symbol: "CRCW", reason: "Confirmed delisted", lastPrice: null },
  ]);
});

test("selectDelisted returns nothing when no security is delisted", () => {
  const parsed = parseValidationReport({ results: [{ symbol: "ABCD", status: "ACTIVE" }] });

  assert.deepEqual(selectDelisted(parsed), []);
});

test("parseValidationReport rejects a report without results", () => {
  assert.throws(() => parseValidationReport({ timestamp: "2026-02-19" }), ZodError);
});

test("loadDelistedSecurities reads the report from disk", async () => {
  const dir = await mkdtemp(join(tmpdir(), "validation-report-"));
  try {
    const path = join(dir, "security_validation.json");
    await writeFile(path, JSON.stringify(report), "utf8");

    const delisted = await loadDelistedSecurities(path);
    assert.deepEqual(delisted.map((security) => security.symbol), ["IPG", "CRCW"]);

    await assert.rejects(loadDelistedSecurities(join(dir, "missing.json")), ReportNotFoundError);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
