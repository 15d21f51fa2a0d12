import { InvalidArgumentError } from "@/lib/errors";
import {
    PurgeCliOptionsSchema,
    ValidateCliOptionsSchema,
    type PurgeCliOptions,
    type ValidateCliOptions,
} from "@/lib/validation/purge";

export const USAGE = `Usage:
  tsx scripts/purge-delisted.ts [SYMBOL ...] [options]

Options:
  --symbols=A,B           Comma-separated symbols to purge (repeatable)
  --from-report[=path]    Add every DELISTED symbol from a security validation report
  --source=table          Source price table (default: $PURGE_SOURCE_TABLE or daily_prices)
  --backup=table          Backup table (default: $PURGE_BACKUP_TABLE or deleted_securities_backup)
  --yes                   Delete the rows after backing them up (otherwise backup only)
  --emit-sql[=path]       Render the reviewable SQL script instead of running it
  --help                  Show this message`;

export const VALIDATE_USAGE = `Usage:
  tsx scripts/validate-securities.ts [options]

Detects stale prices over the latest trading days and writes the stale price
report and the security validation report read by purge-delisted --from-report.

Options:
  --source=table          Price table to analyze (default: $PURGE_SOURCE_TABLE or daily_prices)
  --help                  Show this message`;

const FLAGS = new Set(["yes", "help"]);
const VALUES = new Set(["symbols", "source", "backup"]);
const OPTIONAL_VALUES = new Set(["from-report", "emit-sql"]);

function splitSymbols(value: string): string[] {
    return value
        .split(",")
        .map((symbol) => symbol.trim())
        .filter((symbol) => symbol.length > 0);
}

/**
 * Parse `process.argv.slice(2)`. Options use the `--name=value` form;
 * bare arguments are symbols.
 */
export function parsePurgeArgs(argv: readonly string[]): PurgeCliOptions {
    const symbols: string[] = [];
    let fromReport: string | true | undefined;
    let emitSql: string | true | undefined;
    let sourceTable: string | undefined;
    let backupTable: string | undefined;
    let confirmed = false;
    let help = false;

    for (const arg of argv) {
        if (!arg.startsWith("--")) {
            symbols.push(...splitSymbols(arg));
            continue;
        }

        const eq = arg.indexOf("=");
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
        const value = eq === -1 ? undefined : arg.slice(eq + 1);

        if (FLAGS.has(name)) {
            if (value !== undefined) throw new InvalidArgumentError(`--${name} does not take a value`);
            if (name === "yes") confirmed = true;
            else help = true;
            continue;
        }

        if (VALUES.has(name)) {
            if (value === undefined || value.length === 0) {
                throw new InvalidArgumentError(`--${name} requires a value (--${name}=...)`);
            }
            if (name === "symbols") symbols.push(...splitSymbols(value));
            else if (name === "source") sourceTable = value;
            else backupTable = value;
            continue;
        }

        if (OPTIONAL_VALUES.has(name)) {
            const resolved = value === undefined || value.length === 0 ? true : value;
            if (name === "from-report") fromReport = resolved;
            else emitSql = resolved;
            continue;
        }

        throw new InvalidArgumentError(`Unknown option: --${name}`);
    }

    return PurgeCliOptionsSchema.parse({
        symbols,
        fromReport,
        sourceTable,
        backupTable,
        confirmed,
        emitSql,
        help,
    });
}

export function parseValidateArgs(argv: readonly string[]): ValidateCliOptions {
    let sourceTable: string | undefined;
    let help = false;

    for (const arg of argv) {
        if (arg === "--help") {
            help = true;
        } else if (arg.startsWith("--source=") && arg.length > "--source=".length) {
            sourceTable = arg.slice("--source=".length);
        } else {
            throw new InvalidArgumentError(`Unexpected argument: ${arg}`);
        }
    }

    return ValidateCliOptionsSchema.parse({ sourceTable, help });
}
