import { randomUUID } from "crypto";
import { RunStatus, type ErrorKind, type SummaryRequest } from "../jobs/types";
import type { Queryable } from "./client";
import type { DailyRunStats } from "./types";

export interface StartRunInput {
  senderId: string;
  request: SummaryRequest;
}

export interface FinishRunInput {
  status: RunStatus;
  errorKind: ErrorKind | null;
  videoId: string | null;
  model: string | null;
}

/**
 * History of pipeline runs, one record per incoming summary request.
 */
export interface RunRepository {
  createRun(input: StartRunInput): Promise<string>;
  finishRun(runId: string, input: FinishRunInput): Promise<void>;
  getLastDaysStats(days: number): Promise<DailyRunStats[]>;
}

export class PgRunRepository implements RunRepository {
  constructor(private db: Queryable) {}

  /**
   * Inserts a run in the 'running' state and returns its generated UUID.
   * @param input The sender and the settings the run was started with
   */
  async createRun(input: StartRunInput): Promise<string> {
    const { rows } = await this.db.query<{ id: string }>(
      `INSERT INTO summary_runs (sender_id, mode, tone, status)
       VALUES ($1, $2, $3, 'running') RETURNING id`,
      [input.senderId, input.request.mode, input.request.tone]
    );
    return rows[0].id;
  }

  /**
   * Closes a run with its terminal status, failure kind and the video it concerned.
   * @param runId The UUID returned by createRun
   * @param input The final outcome
   */
  async finishRun(runId: string, input: FinishRunInput): Promise<void> {
    await this.db.query(
      `UPDATE summary_runs
       SET finished_at = NOW(),
           status = $1,
           error_kind = $2,
           video_id = $3,
           model = $4
       WHERE id = $5`,
      [input.status, input.errorKind, input.videoId, input.model, runId]
    );
  }

  /**
   * Aggregates run outcomes per day over a rolling window.
   * @param days The number of days to look back from now
   */
  async getLastDaysStats(days: number): Promise<DailyRunStats[]> {
    // COUNT and SUM come back from Postgres as strings; cast in SQL
    const { rows } = await this.db.query<DailyRunStats>(
      `
      SELECT
        DATE(started_at) as run_date,
        COUNT(id)::int as runs_count,
        COUNT(*) FILTER (WHERE status = 'completed')::int as completed,
        COUNT(*) FILTER (WHERE status = 'failed')::int as failed,
        COUNT(*) FILTER (WHERE status = 'cancelled')::int as cancelled,
        ROUND(
          COUNT(*) FILTER (WHERE status = 'completed')::numeric
            / NULLIF(COUNT(*) FILTER (WHERE status IN ('completed', 'failed')), 0) * 100,
          1
        )::float as success_rate_pct
      FROM summary_runs
      WHERE started_at > NOW() - ($1 * INTERVAL '1 day')
      GROUP BY run_date
      ORDER BY run_date DESC;
      `,
      [days]
    );
    return rows;
  }
}

interface MemoryRun extends StartRunInput, Partial<FinishRunInput> {
  startedAt: Date;
}

function dayOf(date: Date): string {
  return date.toISOString().split("T")[0];
}

export class InMemoryRunRepository implements RunRepository {
  private runs = new Map<string, MemoryRun>();

  constructor(private now: () => Date = () => new Date()) {}

  async createRun(input: StartRunInput): Promise<string> {
    const id = randomUUID();
    this.runs.set(id, { ...input, startedAt: this.now() });
    return id;
  }

  async finishRun(runId: string, input: FinishRunInput): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) throw new Error(`Unknown run ${runId}`);
    this.runs.set(runId, { ...run, ...input });
  }

  async getLastDaysStats(days: number): Promise<DailyRunStats[]> {
    const cutoff = this.now().getTime() - days * 24 * 60 * 60 * 1000;
    const byDay = new Map<string, DailyRunStats>();

    for (const run of this.runs.values()) {
      if (run.startedAt.getTime() <= cutoff) continue;

      const key = dayOf(run.startedAt);
      const stats = byDay.get(key) ?? {
        run_date: new Date(`${key}T00:00:00.000Z`),
        runs_count: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
        success_rate_pct: null
      };

      stats.runs_count++;
      if (run.status === RunStatus.COMPLETED) stats.completed++;
      else if (run.status === RunStatus.FAILED) stats.failed++;
      else if (run.status === RunStatus.CANCELLED) stats.cancelled++;

      const decided = stats.completed + stats.failed;
      stats.success_rate_pct =
        decided === 0 ? null : Math.round((stats.completed / decided) * 1000) / 10;

      byDay.set(key, stats);
    }

    return [...byDay.values()].sort(
      (a, b) => b.run_date.getTime() - a.run_date.getTime()
    );
  }
}
