// mode and tone come back as whatever text was stored; validate before use
export interface UserSettingsRow {
  sender_id: string;
  mode: string;
  tone: string;
  updated_at: Date;
}

export interface DailyRunStats {
  run_date: Date;
  runs_count: number;
  completed: number;
  failed: number;
  cancelled: number;
  success_rate_pct: number | null;
}
