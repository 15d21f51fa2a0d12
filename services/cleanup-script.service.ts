import { writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { format } from "date-fns";
import { PriceKey } from "@/lib/db/schema";
import { EmptySymbolSetError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { CleanupScriptSchema, distinctSymbols, isBlankSymbolSet, type CleanupScriptRequest } from "@/lib/validation/purge";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function quoteLiteral(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Reviewable SQL equivalent of a purge run, for operators who apply it by hand.
 * The DELETE stays commented out unless the request is confirmed.
 */
export function renderCleanupScript(request: CleanupScriptRequest): string {
    if (isBlankSymbolSet(request.symbols)) {
        throw new EmptySymbolSetError();
    }

    const parsed = CleanupScriptSchema.parse(request);
    const symbols = distinctSymbols(parsed.symbols);

    const source = quoteIdentifier(parsed.sourceTable);
    const backup = quoteIdentifier(parsed.backupTable);
    const symbolColumn = quoteIdentifier(PriceKey.symbol);
    const symbolList = symbols.map(quoteLiteral).join(", ");
    const deletePrefix = parsed.confirmed ? "" : "-- ";

    return [
        "-- Delisted Securities Purge",
        `-- Generated: ${format(parsed.generatedAt, TIMESTAMP_FORMAT)}`,
        `-- Symbols (${symbols.length}): ${symbols.join(", ")}`,
        parsed.confirmed
            ? "-- Mode: confirmed (backup and delete)"
            : "-- Mode: review (DELETE left commented out)",
        ...(parsed.confirmed ? [] : ["-- CAUTION: Review before executing"]),
        "",
        "BEGIN;",
        "",
        "-- Backup delisted securities data before removal",
        `CREATE TABLE IF NOT EXISTS ${backup} (LIKE ${source} INCLUDING DEFAULTS INCLUDING CONSTRAINTS INCLUDING INDEXES);`,
        "",
        `INSERT INTO ${backup}`,
        `SELECT * FROM ${source} WHERE ${symbolColumn} IN (${symbolList})`,
        "ON CONFLICT DO NOTHING;",
        "",
        "-- Remove delisted securities from main table",
        `${deletePrefix}DELETE FROM ${source} WHERE ${symbolColumn} IN (${symbolList});`,
        ...(parsed.confirmed ? [] : ["", "-- Note: Uncomment the DELETE statement above after reviewing the backup"]),
        "",
        "COMMIT;",
        "",
        "-- Statistics after cleanup:",
        `-- SELECT COUNT(*) AS remaining_records FROM ${source};`,
        `-- SELECT COUNT(DISTINCT ${symbolColumn}) AS remaining_securities FROM ${source};`,
        "",
    ].join("\n");
}

export async function writeCleanupScript(path: string, request: CleanupScriptRequest): Promise<string> {
    const script = renderCleanupScript(request);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, script, "utf8");
    logger.info({ path, symbols: request.symbols.length }, "📄 SQL cleanup script saved");
    return script;
}
