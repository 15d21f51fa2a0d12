import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

config({ path: ".env" });
config({ path: ".env.local" });

export default defineConfig({
  schema: "./lib/db/schema",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: {
    // Migrations run over the direct (non-pooler) URL when one is set
    url: process.env.DIRECT_URL ?? process.env.DATABASE_URL ?? "",
  },
});
