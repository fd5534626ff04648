import { beforeEach, describe, expect, it, vi } from "vitest";
import type { RunRepository } from "../db/runRepository";
import type { DailyRunStats } from "../db/types";
import { formatRunStats, printRunReport, successIcon } from "./runReport";

function day(date: string, overrides: Partial<DailyRunStats> = {}): DailyRunStats {
  return {
    run_date: new Date(`${date}T00:00:00.000Z`),
    runs_count: 10,
    completed: 8,
    failed: 2,
    cancelled: 0,
    success_rate_pct: 80,
    ...overrides
  };
}

function repoWith(stats: DailyRunStats[]): RunRepository {
  return {
    createRun: vi.fn(),
    finishRun: vi.fn(),
    getLastDaysStats: vi.fn().mockResolvedValue(stats)
  };
}

describe("successIcon", () => {
  it.each([
    [100, "🟢"],
    [80, "🟡"],
    [79.9, "🔴"]
  ])("maps %d%% to %s", (pct, icon) => {
    expect(successIcon(pct)).toBe(icon);
  });
});

describe("formatRunStats", () => {
  it("builds one table row per day", () => {
    expect(formatRunStats([day("2024-03-10")])).toEqual([
      {
        " ": "🟡",
        Date: "2024-03-10",
        Runs: 10,
        Done: 8,
        Fail: 2,
        Cancelled: 0,
        "Success %": "80.0%"
      }
    ]);
  });

  it("counts a day with nothing to decide as fully successful", () => {
    const [row] = formatRunStats([
      day("2024-03-11", { runs_count: 2, completed: 0, failed: 0, cancelled: 2, success_rate_pct: null })
    ]);
    expect(row[" "]).toBe("🟢");
    expect(row["Success %"]).toBe("100.0%");
  });
});

describe("printRunReport", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "table").mockImplementation(() => undefined);
  });

  it("prints a notice when there is no history", async () => {
    await printRunReport(repoWith([]), 7);

    expect(console.log).toHaveBeenCalledWith("\n--- No runs found for the last 7 days ---");
    expect(console.table).not.toHaveBeenCalled();
  });

  it("prints the table for the requested window", async () => {
    const repo = repoWith([day("2024-03-10")]);

    await printRunReport(repo, 30);

    expect(repo.getLastDaysStats).toHaveBeenCalledWith(30);
    expect(console.table).toHaveBeenCalledWith(formatRunStats([day("2024-03-10")]));
  });
});
