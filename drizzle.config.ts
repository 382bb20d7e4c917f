import { defineConfig } from "drizzle-kit";
import * as dotenv from "dotenv";

import { parseDatabaseUrl } from "./db/database-url";

dotenv.config({ path: ".env.local" });

const databaseUrl = process.env.DATABASE_URL;

if (!databaseUrl) {
  throw new Error("DATABASE_URL is missing");
}

export default defineConfig({
  dialect: "postgresql",
  schema: "./db/schema.ts",
  out: "./drizzle",
  dbCredentials: parseDatabaseUrl(databaseUrl),
});
