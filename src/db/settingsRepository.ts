import {
  DEFAULT_SUMMARY_REQUEST,
  SummaryMode,
  SummaryTone,
  type SummaryRequest
} from "../jobs/types";
import type { Queryable } from "./client";
import type { UserSettingsRow } from "./types";

export type UserSettings = SummaryRequest;

/**
 * Per-sender summary preferences. Keyed by the transport's sender id and read once
 * per request, so the pipeline itself never touches shared state.
 */
export interface SettingsRepository {
  get(senderId: string): Promise<UserSettings>;
  update(senderId: string, patch: Partial<UserSettings>): Promise<UserSettings>;
}

const MODES = new Set<string>(Object.values(SummaryMode));
const TONES = new Set<string>(Object.values(SummaryTone));

export function isSummaryMode(value: string): value is SummaryMode {
  return MODES.has(value);
}

export function isSummaryTone(value: string): value is SummaryTone {
  return TONES.has(value);
}

export class InMemorySettingsRepository implements SettingsRepository {
  private store = new Map<string, UserSettings>();

  async get(senderId: string): Promise<UserSettings> {
    return this.store.get(senderId) ?? DEFAULT_SUMMARY_REQUEST;
  }

  async update(
    senderId: string,
    patch: Partial<UserSettings>
  ): Promise<UserSettings> {
    const next = Object.freeze({ ...(await this.get(senderId)), ...patch });
    this.store.set(senderId, next);
    return next;
  }
}

export class PgSettingsRepository implements SettingsRepository {
  constructor(private db: Queryable) {}

  /**
   * Loads a sender's preferences, falling back to the defaults for unknown senders
   * or values written by an older version with a mode or tone that no longer exists.
   * @param senderId The chat transport's user id
   */
  async get(senderId: string): Promise<UserSettings> {
    const { rows } = await this.db.query<UserSettingsRow>(
      `SELECT sender_id, mode, tone, updated_at FROM user_settings WHERE sender_id = $1`,
      [senderId]
    );

    const row = rows[0];
    if (!row) return DEFAULT_SUMMARY_REQUEST;

    return {
      mode: isSummaryMode(row.mode) ? row.mode : DEFAULT_SUMMARY_REQUEST.mode,
      tone: isSummaryTone(row.tone) ? row.tone : DEFAULT_SUMMARY_REQUEST.tone
    };
  }

  /**
   * Merges a partial change into the stored preferences and upserts the row.
   * @param senderId The chat transport's user id
   * @param patch The fields to change
   * @returns The preferences after the change
   */
  async update(
    senderId: string,
    patch: Partial<UserSettings>
  ): Promise<UserSettings> {
    const next = { ...(await this.get(senderId)), ...patch };

    await this.db.query(
      `
      INSERT INTO user_settings (sender_id, mode, tone)
      VALUES ($1, $2, $3)
      ON CONFLICT (sender_id) DO UPDATE
      SET
        mode = EXCLUDED.mode,
        tone = EXCLUDED.tone,
        updated_at = now()
      `,
      [senderId, next.mode, next.tone]
    );

    return next;
  }
}
