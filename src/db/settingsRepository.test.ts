import { describe, expect, it, vi } from "vitest";
import { DEFAULT_SUMMARY_REQUEST, SummaryMode, SummaryTone } from "../jobs/types";
import type { Queryable } from "./client";
import {
  InMemorySettingsRepository,
  PgSettingsRepository,
  isSummaryMode,
  isSummaryTone
} from "./settingsRepository";

function fakeDb(rows: Record<string, unknown>[] = []) {
  const query = vi.fn().mockResolvedValue({ rows });
  const db: Queryable = { query };
  return { db, query };
}

describe("isSummaryMode / isSummaryTone", () => {
  it("accepts the known values only", () => {
    expect(isSummaryMode("bullet")).toBe(true);
    expect(isSummaryMode("haiku")).toBe(false);
    expect(isSummaryTone("beginner-friendly")).toBe(true);
    expect(isSummaryTone("sarcastic")).toBe(false);
  });
});

describe("InMemorySettingsRepository", () => {
  it("returns the defaults for an unknown sender", async () => {
    const repo = new InMemorySettingsRepository();
    expect(await repo.get("1")).toEqual(DEFAULT_SUMMARY_REQUEST);
  });

  it("merges updates per sender", async () => {
    const repo = new InMemorySettingsRepository();

    await repo.update("1", { mode: SummaryMode.QUICK });
    const updated = await repo.update("1", { tone: SummaryTone.TECHNICAL });

    expect(updated).toEqual({ mode: SummaryMode.QUICK, tone: SummaryTone.TECHNICAL });
    expect(await repo.get("1")).toEqual(updated);
    expect(await repo.get("2")).toEqual(DEFAULT_SUMMARY_REQUEST);
  });
});

describe("PgSettingsRepository", () => {
  it("reads a stored row by sender id", async () => {
    const { db, query } = fakeDb([
      { sender_id: "7", mode: "bullet", tone: "technical", updated_at: new Date() }
    ]);
    const repo = new PgSettingsRepository(db);

    expect(await repo.get("7")).toEqual({
      mode: SummaryMode.BULLET,
      tone: SummaryTone.TECHNICAL
    });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("FROM user_settings"), ["7"]);
  });

  it("falls back to defaults for a missing row", async () => {
    const repo = new PgSettingsRepository(fakeDb().db);
    expect(await repo.get("7")).toEqual(DEFAULT_SUMMARY_REQUEST);
  });

  it("replaces stored values it no longer recognises", async () => {
    const { db } = fakeDb([
      { sender_id: "7", mode: "essay", tone: "technical", updated_at: new Date() }
    ]);
    const repo = new PgSettingsRepository(db);

    expect(await repo.get("7")).toEqual({
      mode: DEFAULT_SUMMARY_REQUEST.mode,
      tone: SummaryTone.TECHNICAL
    });
  });

  it("upserts the merged settings", async () => {
    const { db, query } = fakeDb();
    const repo = new PgSettingsRepository(db);

    const saved = await repo.update("7", { tone: SummaryTone.BEGINNER });

    expect(saved).toEqual({ mode: SummaryMode.DETAILED, tone: SummaryTone.BEGINNER });
    const [sql, params] = query.mock.calls[1];
    expect(sql).toContain("ON CONFLICT (sender_id) DO UPDATE");
    expect(params).toEqual(["7", "detailed", "beginner-friendly"]);
  });
});
