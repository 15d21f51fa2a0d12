import pino from "pino";
import { config } from "./config";

export const logger = pino({
    level: config.logLevel,
    base: { service: "delisted-price-purge" },
    redact: {
        paths: [
            "password",
            "secret",
            "connectionString",
            "databaseUrl",
            "db.url",
        ],
        remove: true,
    },
    serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
    },
});
