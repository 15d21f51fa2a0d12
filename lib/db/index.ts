import { Pool } from "pg";
import { sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { config } from "../config";
import { ConfigurationError } from "../errors";
import * as schema from "./schema";
import { logger } from "../logger";

export type Database = NodePgDatabase<typeof schema>;

function withVerifyFullSslMode(databaseUrl: string): string {
    try {
        const parsed = new URL(databaseUrl);
        parsed.searchParams.set("sslmode", "verify-full");
        return parsed.toString();
    } catch {
        const joiner = databaseUrl.includes("?") ? "&" : "?";
        if (databaseUrl.includes("sslmode=")) {
            return databaseUrl.replace(/sslmode=[^&]*/i, "sslmode=verify-full");
        }
        return `${databaseUrl}${joiner}sslmode=verify-full`;
    }
}

let pool: Pool | null = null;
let database: Database | null = null;

/**
 * Lazily open the pool so commands that never touch the database
 * (script rendering, --help) run without DATABASE_URL.
 */
export function getDb(): Database {
    if (database) return database;

    const url = config.db.url;
    if (!url) {
        throw new ConfigurationError("DATABASE_URL is missing; cannot open a database connection.");
    }

    pool = new Pool({
        connectionString: config.db.ssl ? withVerifyFullSslMode(url) : url,
        max: 2,
    });
    pool.on("error", (error) => {
        logger.error({ err: error }, "Idle database client failed");
    });

    database = drizzle(pool, {
        schema,
        logger: config.isDev, // Log queries in dev mode
    });
    return database;
}

// Simple connectivity check, run before any statement of the purge
export async function checkDbConnection(): Promise<boolean> {
    const db = getDb();
    try {
        await db.execute(sql`SELECT 1`);
        logger.info("Database connection established successfully.");
        return true;
    } catch (error) {
        logger.error({ err: error }, "Failed to connect to the database.");
        return false;
    }
}

export async function closeDb(): Promise<void> {
    if (!pool) return;
    const current = pool;
    pool = null;
    database = null;
    await current.end();
}
