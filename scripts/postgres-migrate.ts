import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Pool } from "pg";
import { makeLogger } from "../src/infra/logger.js";

const logger = makeLogger("info", { component: "db-migrate" });

async function main(): Promise<void> {
  const connectionString = process.env.BROKER_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("BROKER_POSTGRES_URL is required.");
  }

  const migrationsDir = resolve(process.cwd(), "sql");
  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith(".sql")).sort();
  const pool = new Pool({ connectionString });

  try {
    for (const file of files) {
      const sql = await readFile(join(migrationsDir, file), "utf8");
      await pool.query(sql);
      logger.info({ file }, "Applied migration");
    }
  } finally {
    await pool.end();
  }
}

await main();
