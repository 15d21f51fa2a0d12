import { z } from "zod";

// The CLI loads .env through `dotenv/config` before this module is imported.

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
    // Database (only required once a connection is opened)
    DATABASE_URL: z.string().url().optional(),
    DATABASE_SSL: booleanFlag,

    // Environment
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

    // Purge defaults
    PURGE_SOURCE_TABLE: z.string().min(1).default("daily_prices"),
    PURGE_BACKUP_TABLE: z.string().min(1).default("deleted_securities_backup"),

    // Files
    REMOVAL_LOG_PATH: z.string().min(1).default("data/removal_log.json"),
    VALIDATION_REPORT_PATH: z.string().min(1).default("data/security_validation.json"),
    STALE_REPORT_PATH: z.string().min(1).default("data/stale_price_report.json"),

    // Security status check
    KNOWN_DELISTED_SYMBOLS: z
        .string()
        .default("MODG,TWTR,FB")
        .transform((value) =>
            value
                .split(",")
                .map((symbol) => symbol.trim())
                .filter((symbol) => symbol.length > 0)
        ),
});

export function loadConfig(source: NodeJS.ProcessEnv) {
    // Throws on invalid values: fail fast before any statement runs.
    const env = envSchema.parse(source);
    const isDev = env.NODE_ENV === "development";

    return {
        env: env.NODE_ENV,
        isDev,
        isProd: env.NODE_ENV === "production",
        logLevel: env.LOG_LEVEL ?? (isDev ? "debug" : "info"),
        db: {
            url: env.DATABASE_URL,
            ssl: env.DATABASE_SSL,
        },
        purge: {
            sourceTable: env.PURGE_SOURCE_TABLE,
            backupTable: env.PURGE_BACKUP_TABLE,
        },
        files: {
            removalLog: env.REMOVAL_LOG_PATH,
            validationReport: env.VALIDATION_REPORT_PATH,
            staleReport: env.STALE_REPORT_PATH,
        },
        validation: {
            knownDelisted: env.KNOWN_DELISTED_SYMBOLS,
        },
    } as const;
}

export const config = loadConfig(process.env);
