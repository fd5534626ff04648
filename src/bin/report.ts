#!/usr/bin/env npx tsx
import "dotenv/config";
import { createDatabase } from "../db/client";
import { PgRunRepository } from "../db/runRepository";
import { printRunReport } from "../jobs/runReport";

async function main() {
  // Usage: npm run report 30
  const args = process.argv.slice(2);
  const days = args[0] ? parseInt(args[0], 10) : 7;
  if (isNaN(days) || days <= 0) {
    console.error("Error: Please provide a valid number of days.");
    process.exit(1);
  }

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("Error: DATABASE_URL is required for the run report.");
    process.exit(1);
  }

  const db = createDatabase({
    databaseUrl,
    databaseSsl: process.env.DATABASE_SSL === "true"
  });

  try {
    await printRunReport(new PgRunRepository(db), days);
    await db.shutdown();
    process.exit(0);
  } catch (err: unknown) {
    console.error(
      "💥 Command failed:",
      err instanceof Error ? err.message : String(err)
    );
    await db.shutdown().catch((shutdownErr: unknown) => {
      console.error("Pool shutdown failed:", String(shutdownErr));
    });
    process.exit(1);
  }
}

void main();
