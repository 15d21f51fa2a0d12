import { z } from "zod";

/**
 * Validation schemas for the delisted-securities purge.
 * Table names end up as quoted identifiers and symbols as bound parameters,
 * but both are still checked here so nothing odd reaches a statement or a script.
 */

export const TableNameSchema = z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, "Table name must be a lowercase SQL identifier")
    .max(63, "Table name exceeds 63 characters");

// Case-sensitive: "ipg" and "IPG" are different symbols.
export const SymbolSchema = z
    .string()
    .trim()
    .min(1, "Symbol cannot be blank")
    .max(32, "Symbol exceeds 32 characters")
    .regex(/^[^\s'"`;]+$/, "Symbol contains whitespace, quotes or semicolons");

const TablePairSchema = z.object({
    sourceTable: TableNameSchema,
    backupTable: TableNameSchema,
});

function distinctTables(value: { sourceTable: string; backupTable: string }): boolean {
    return value.sourceTable !== value.backupTable;
}

const distinctTablesMessage = {
    message: "Backup table must differ from the source table",
    path: ["backupTable"],
};

// Purge one symbol set (backup always, delete only when confirmed)
export const PurgeRequestSchema = TablePairSchema.extend({
    symbols: z.array(SymbolSchema),
    confirmed: z.boolean().default(false),
    invocationTime: z.date().default(() => new Date()),
}).refine(distinctTables, distinctTablesMessage);

// Render the reviewable SQL script for a symbol set
export const CleanupScriptSchema = TablePairSchema.extend({
    symbols: z.array(SymbolSchema),
    confirmed: z.boolean().default(false),
    generatedAt: z.date().default(() => new Date()),
}).refine(distinctTables, distinctTablesMessage);

// Options accepted by scripts/purge-delisted.ts
export const PurgeCliOptionsSchema = z.object({
    symbols: z.array(SymbolSchema).default([]),
    fromReport: z.union([z.literal(true), z.string().min(1)]).optional(),
    sourceTable: TableNameSchema.optional(),
    backupTable: TableNameSchema.optional(),
    confirmed: z.boolean().default(false),
    emitSql: z.union([z.literal(true), z.string().min(1)]).optional(),
    help: z.boolean().default(false),
});

// Options accepted by scripts/validate-securities.ts
export const ValidateCliOptionsSchema = z.object({
    sourceTable: TableNameSchema.optional(),
    help: z.boolean().default(false),
});

// Type exports for TypeScript inference
export type PurgeRequest = z.input<typeof PurgeRequestSchema>;
export type CleanupScriptRequest = z.input<typeof CleanupScriptSchema>;
export type PurgeCliOptions = z.output<typeof PurgeCliOptionsSchema>;
export type ValidateCliOptions = z.output<typeof ValidateCliOptionsSchema>;

/** True when nothing but blanks was given, which counts as an empty symbol set. */
export function isBlankSymbolSet(symbols: readonly string[]): boolean {
    return symbols.every((symbol) => symbol.trim().length === 0);
}

/** Drop repeated symbols, keeping the first occurrence. */
export function distinctSymbols(symbols: readonly string[]): string[] {
    return [...new Set(symbols)];
}
