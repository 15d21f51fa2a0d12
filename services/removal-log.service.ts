import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { format } from "date-fns";
import { z } from "zod";
import { logger } from "@/lib/logger";

const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const RemovalEntrySchema = z.object({
    symbol: z.string().min(1),
    date: DateSchema,
    reason: z.string(),
    status: z.string(),
    lastPrice: z.number().nullable(),
    // null for entries carried over from a log that predates backup tables
    backupTable: z.string().min(1).nullable(),
    watchlist: z.string().optional(),
});

const RemovalLogSchema = z.object({
    lastUpdated: z.string().nullable(),
    removals: z.array(RemovalEntrySchema),
});

export type RemovalEntry = z.infer<typeof RemovalEntrySchema>;
export type RemovalLog = z.infer<typeof RemovalLogSchema>;

// snake_case log written by the older maintenance scripts; rewritten in the current shape on the next record()
const LegacyRemovalLogSchema = z
    .object({
        last_updated: z.string().nullable(),
        removals: z.array(
            z.object({
                symbol: z.string().min(1),
                date: DateSchema,
                reason: z.string(),
                status: z.string(),
                last_price: z.number().nullable().optional(),
                watchlist: z.string().optional(),
            })
        ),
    })
    .transform(
        (legacy): RemovalLog => ({
            lastUpdated: legacy.last_updated,
            removals: legacy.removals.map((entry) => ({
                symbol: entry.symbol,
                date: entry.date,
                reason: entry.reason,
                status: entry.status,
                lastPrice: entry.last_price ?? null,
                backupTable: null,
                watchlist: entry.watchlist,
            })),
        })
    );

const StoredRemovalLogSchema = z.union([RemovalLogSchema, LegacyRemovalLogSchema]);

export interface RemovalInput {
    symbol: string;
    reason: string;
    lastPrice?: number | null;
    backupTable: string;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Persistent JSON history of securities removed by confirmed purges.
 * One entry per symbol: a symbol purged twice keeps its first entry.
 */
export class RemovalLogService {
    constructor(private readonly path: string) {}

    async load(): Promise<RemovalLog> {
        let raw: string;
        try {
            raw = await readFile(this.path, "utf8");
        } catch (error) {
            if (isMissingFile(error)) {
                return { lastUpdated: null, removals: [] };
            }
            throw error;
        }
        return StoredRemovalLogSchema.parse(JSON.parse(raw));
    }

    async record(inputs: readonly RemovalInput[], now: Date = new Date()): Promise<RemovalEntry[]> {
        const log = await this.load();
        const logged = new Set(log.removals.map((entry) => entry.symbol));
        const added: RemovalEntry[] = [];

        for (const input of inputs) {
            if (logged.has(input.symbol)) continue;
            logged.add(input.symbol);
            added.push({
                symbol: input.symbol,
                date: format(now, "yyyy-MM-dd"),
                reason: input.reason,
                status: "DELISTED",
                lastPrice: input.lastPrice ?? null,
                backupTable: input.backupTable,
            });
        }

        if (added.length === 0) {
            logger.debug({ path: this.path }, "Removal log already up to date");
            return added;
        }

        const next: RemovalLog = {
            lastUpdated: format(now, "yyyy-MM-dd HH:mm:ss"),
            removals: [...log.removals, ...added],
        };

        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(this.path, `${JSON.stringify(next, null, 2)}\n`, "utf8");
        logger.info({ path: this.path, added: added.map((entry) => entry.symbol) }, "Removal log updated");

        return added;
    }
}
