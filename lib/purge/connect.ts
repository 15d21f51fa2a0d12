import { checkDbConnection, getDb } from "@/lib/db";
import { StorageEngineError } from "@/lib/errors";
import { PostgresPriceArchiveStore } from "./price-archive.repository";

/** Opens the pool and checks it answers before any statement runs. */
export async function connectPriceArchiveStore(): Promise<PostgresPriceArchiveStore> {
    const db = getDb();
    if (!(await checkDbConnection())) {
        throw new StorageEngineError("Cannot reach the database; nothing was changed");
    }
    return new PostgresPriceArchiveStore(db);
}
