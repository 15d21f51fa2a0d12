import { ZodError } from "zod";
import { logger } from "./logger";

export class PurgeError extends Error {
    public readonly code: string;
    public readonly exitCode: number;

    constructor(message: string, code: string = "PURGE_FAILED", exitCode: number = 1, options?: ErrorOptions) {
        super(message, options);
        this.code = code;
        this.exitCode = exitCode;
        this.name = "PurgeError";
    }
}

export class EmptySymbolSetError extends PurgeError {
    constructor() {
        super("At least one symbol is required", "EMPTY_SYMBOL_SET", 2);
        this.name = "EmptySymbolSetError";
    }
}

export class InvalidArgumentError extends PurgeError {
    constructor(message: string) {
        super(message, "INVALID_ARGUMENT", 2);
        this.name = "InvalidArgumentError";
    }
}

export class TableNotFoundError extends PurgeError {
    public readonly table: string;

    constructor(table: string) {
        super(`Table "${table}" does not exist`, "TABLE_NOT_FOUND", 3);
        this.table = table;
        this.name = "TableNotFoundError";
    }
}

export class ReportNotFoundError extends PurgeError {
    public readonly path: string;

    constructor(path: string) {
        super(`Validation report not found at ${path}`, "REPORT_NOT_FOUND", 3);
        this.path = path;
        this.name = "ReportNotFoundError";
    }
}

export class BackupIncompleteError extends PurgeError {
    public readonly missing: number;

    constructor(backupTable: string, missing: number) {
        super(`${missing} row(s) are missing from "${backupTable}"; refusing to delete`, "BACKUP_INCOMPLETE", 4);
        this.missing = missing;
        this.name = "BackupIncompleteError";
    }
}

export class StorageEngineError extends PurgeError {
    constructor(message: string, cause?: unknown) {
        super(message, "STORAGE_ENGINE_ERROR", 5, cause === undefined ? undefined : { cause });
        this.name = "StorageEngineError";
    }
}

// The delete is already committed when this is raised; only the log write failed.
export class RemovalLogError extends PurgeError {
    public readonly backupTable: string;

    constructor(backupTable: string, cause: unknown) {
        super(
            `Purge committed (rows are archived in "${backupTable}") but the removal log could not be updated: ${
                cause instanceof Error ? cause.message : String(cause)
            }`,
            "REMOVAL_LOG_FAILED",
            7,
            { cause }
        );
        this.backupTable = backupTable;
        this.name = "RemovalLogError";
    }
}

export class ConfigurationError extends PurgeError {
    constructor(message: string) {
        super(message, "CONFIGURATION_ERROR", 6);
        this.name = "ConfigurationError";
    }
}

export interface ErrorReport {
    code: string;
    message: string;
    details?: unknown; // For Validation Errors
    exitCode: number;
}

export function handleError(error: unknown): ErrorReport {
    // 1. Known PurgeError
    if (error instanceof PurgeError) {
        logger.warn({ err: error }, `${error.name}: ${error.message}`);
        return { code: error.code, message: error.message, exitCode: error.exitCode };
    }

    // 2. Zod validation errors
    if (error instanceof ZodError) {
        logger.warn({ err: error }, "Validation Error");
        return {
            code: "VALIDATION_ERROR",
            message: "Invalid purge parameters",
            details: error.errors,
            exitCode: 2,
        };
    }

    // 3. Unexpected errors
    logger.error({ err: error }, "Unhandled Exception");
    return {
        code: "INTERNAL_ERROR",
        message: error instanceof Error ? error.message : "An unexpected error occurred.",
        exitCode: 1,
    };
}
