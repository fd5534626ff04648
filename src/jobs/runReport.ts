import type { RunRepository } from "../db/runRepository";
import type { DailyRunStats } from "../db/types";

export interface RunReportRow {
  " ": string;
  Date: string;
  Runs: number;
  Done: number;
  Fail: number;
  Cancelled: number;
  "Success %": string;
}

export function successIcon(successPct: number): string {
  if (successPct === 100) return "🟢";
  if (successPct >= 80) return "🟡";
  return "🔴";
}

export function formatRunStats(stats: DailyRunStats[]): RunReportRow[] {
  return stats.map((s) => {
    // A day with only cancellations had nothing to fail at
    const successVal = s.success_rate_pct ?? 100;

    return {
      " ": successIcon(successVal),
      Date: s.run_date.toISOString().split("T")[0],
      Runs: s.runs_count,
      Done: s.completed,
      Fail: s.failed,
      Cancelled: s.cancelled,
      "Success %": `${successVal.toFixed(1)}%`
    };
  });
}

/**
 * Prints a per-day table of summary runs over the last `days` days.
 * @param runs Run history source
 * @param days Rolling window size
 */
export async function printRunReport(runs: RunRepository, days: number): Promise<void> {
  const stats = await runs.getLastDaysStats(days);

  if (stats.length === 0) {
    console.log(`\n--- No runs found for the last ${days} days ---`);
    return;
  }

  console.log(`\n=== SUMMARY RUNS (Last ${days} Days) ===`);
  console.table(formatRunStats(stats));
  console.log(`Legend: 🟢 100% | 🟡 >=80% | 🔴 <80% \n`);
}
