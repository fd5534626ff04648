import type { UserSettings } from "../db/settingsRepository";
import { SummaryMode, SummaryTone } from "../jobs/types";
import type { ModelStatus } from "../services/modelManager";

export interface KeyboardButton {
  text: string;
  action: string;
}

/** A message the transport can render: text, parse mode and an inline keyboard. */
export interface BotView {
  text: string;
  html: boolean;
  keyboard?: KeyboardButton[][];
}

export const Actions = {
  SUMMARIZE: "summarize",
  SETTINGS: "settings",
  HELP: "help",
  ABOUT: "about",
  FORMAT: "format",
  CANCEL: "cancel",
  SET_MODE: "set_mode",
  SET_TONE: "set_tone",
  MODEL_STATUS: "model_status"
} as const;

export const MODE_ACTION_PREFIX = "mode_";
export const TONE_ACTION_PREFIX = "tone_";

export const PROCESSING_TEXT =
  "🔄 Processing your request...\nThis might take a few moments depending on the video length.";
export const RUN_CANCELLED_TEXT = "❌ Summary cancelled.";
export const GENERIC_ERROR_TEXT =
  "❌ An error occurred while processing your request. It has been logged.";

const MODE_LABELS: Record<SummaryMode, string> = {
  [SummaryMode.DETAILED]: "Detailed",
  [SummaryMode.BULLET]: "Bullet",
  [SummaryMode.QUICK]: "Quick"
};

const TONE_LABELS: Record<SummaryTone, string> = {
  [SummaryTone.SIMPLE]: "Simple",
  [SummaryTone.TECHNICAL]: "Technical",
  [SummaryTone.BEGINNER]: "Beginner-friendly"
};

const MAIN_MENU: KeyboardButton[][] = [
  [
    { text: "🎥 Summarize Video", action: Actions.SUMMARIZE },
    { text: "⚙️ Settings", action: Actions.SETTINGS }
  ],
  [
    { text: "❓ Help", action: Actions.HELP },
    { text: "ℹ️ About", action: Actions.ABOUT }
  ],
  [{ text: "🔗 URL Formats", action: Actions.FORMAT }]
];

const CANCEL_ROW: KeyboardButton[] = [{ text: "❌ Cancel", action: Actions.CANCEL }];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Converts a millisecond span into "4m 10s" / "35s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.ceil(ms / 1000);
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}

export function welcomeView(): BotView {
  return {
    text:
      "👋 Welcome to the YouTube Summarizer Bot!\n\n" +
      "Send me a YouTube link and I'll reply with a short summary of the video.\n\n" +
      "Tap '🎥 Summarize Video' to start, or choose another option:",
    html: false,
    keyboard: MAIN_MENU
  };
}

export function menuView(): BotView {
  return {
    text: "👋 Send me a YouTube link, or choose an option:",
    html: false,
    keyboard: MAIN_MENU.slice(0, 2)
  };
}

export function helpView(): BotView {
  return {
    text:
      "<b>🤖 Available Commands:</b>\n\n" +
      "/start - Show the main menu\n" +
      "/summarize - Summarize a YouTube video\n" +
      "/settings - Change summary mode and tone\n" +
      "/format - Show supported URL formats\n" +
      "/about - About this bot\n" +
      "/help - Show this help message\n\n" +
      "<b>📝 How to use:</b>\n" +
      "1. Send a YouTube URL\n" +
      "2. Wait for the summary\n\n" +
      "⚠️ The video must have English captions available.",
    html: true
  };
}

export function aboutView(models: readonly string[]): BotView {
  const modelList = models.map((m) => `• ${escapeHtml(m)}`).join("\n");
  return {
    text:
      "<b>🤖 YouTube Summarizer Bot</b>\n\n" +
      "Fetches a video's captions and asks a generative model for a condensed summary.\n\n" +
      `<b>🛠 Models:</b>\n${modelList}`,
    html: true
  };
}

export function formatView(): BotView {
  return {
    text:
      "<b>🔗 Supported YouTube URL Formats:</b>\n\n" +
      "• Regular videos:\n  <code>https://www.youtube.com/watch?v=VIDEO_ID</code>\n\n" +
      "• Short links:\n  <code>https://youtu.be/VIDEO_ID</code>\n\n" +
      "• Embedded videos:\n  <code>https://www.youtube.com/embed/VIDEO_ID</code>\n\n" +
      "• YouTube Shorts:\n  <code>https://youtube.com/shorts/VIDEO_ID</code>",
    html: true
  };
}

export function promptForUrlView(): BotView {
  return {
    text:
      "🎥 <b>Please send me the YouTube video URL you want to summarize.</b>\n\n" +
      "⚠️ The video must have English captions available.",
    html: true,
    keyboard: [CANCEL_ROW]
  };
}

export function processingView(): BotView {
  return { text: PROCESSING_TEXT, html: false, keyboard: [CANCEL_ROW] };
}

export function cancelledView(): BotView {
  return {
    text: "❌ Operation cancelled. Send /start to begin again.",
    html: false
  };
}

function describeSettings(settings: UserSettings): string {
  return (
    `📝 Mode: ${MODE_LABELS[settings.mode]}\n` +
    `🎯 Tone: ${TONE_LABELS[settings.tone]}`
  );
}

export function settingsView(settings: UserSettings, currentModel: string): BotView {
  return {
    text:
      "<b>⚙️ Current Settings:</b>\n\n" +
      `${describeSettings(settings)}\n\n` +
      `🤖 Current Model: ${escapeHtml(currentModel)}\n\n` +
      "Select a setting to change:",
    html: true,
    keyboard: [
      [
        { text: "📝 Summary Mode", action: Actions.SET_MODE },
        { text: "🎯 Tone", action: Actions.SET_TONE }
      ],
      [{ text: "📊 Model Status", action: Actions.MODEL_STATUS }],
      CANCEL_ROW
    ]
  };
}

export function settingsUpdatedView(label: string, settings: UserSettings): BotView {
  return {
    text:
      `✅ ${label} updated!\n\n` +
      "<b>⚙️ Current Settings:</b>\n\n" +
      `${describeSettings(settings)}\n\n` +
      "Use /settings to make more changes.",
    html: true
  };
}

export function modePickerView(): BotView {
  return {
    text:
      "<b>📝 Select Summary Mode:</b>\n\n" +
      "📄 Detailed: Sections with short paragraphs\n" +
      "📌 Bullet: Clean bullet points\n" +
      "⚡ Quick: Three key points",
    html: true,
    keyboard: [
      [
        { text: "📄 Detailed", action: `${MODE_ACTION_PREFIX}${SummaryMode.DETAILED}` },
        { text: "📌 Bullet", action: `${MODE_ACTION_PREFIX}${SummaryMode.BULLET}` }
      ],
      [{ text: "⚡ Quick", action: `${MODE_ACTION_PREFIX}${SummaryMode.QUICK}` }, ...CANCEL_ROW]
    ]
  };
}

export function tonePickerView(): BotView {
  return {
    text:
      "<b>🎯 Select Summary Tone:</b>\n\n" +
      "👥 Simple: Everyday language\n" +
      "🔬 Technical: Precise terminology\n" +
      "🎓 Beginner: Explanatory style",
    html: true,
    keyboard: [
      [
        { text: "👥 Simple", action: `${TONE_ACTION_PREFIX}${SummaryTone.SIMPLE}` },
        { text: "🔬 Technical", action: `${TONE_ACTION_PREFIX}${SummaryTone.TECHNICAL}` }
      ],
      [{ text: "🎓 Beginner", action: `${TONE_ACTION_PREFIX}${SummaryTone.BEGINNER}` }, ...CANCEL_ROW]
    ]
  };
}

export function modelStatusView(statuses: ModelStatus[]): BotView {
  const blocks = statuses.map((s) => {
    const lines = [
      `<b>${escapeHtml(s.name)}</b>`,
      `• Available: ${s.available ? "✅" : "❌"}`,
      `• Quota Remaining: ${s.quotaRemaining ? "✅" : "❌"}`
    ];
    if (s.cooldownRemainingMs !== null) {
      lines.push(`• Cooldown: ${formatDuration(s.cooldownRemainingMs)}`);
    }
    if (s.lastSuccess) {
      lines.push(`• Last Success: ${s.lastSuccess.toISOString()}`);
    }
    return lines.join("\n");
  });

  return {
    text: `<b>🤖 AI Model Status:</b>\n\n${blocks.join("\n\n")}`,
    html: true,
    keyboard: [
      [
        { text: "🔄 Refresh", action: Actions.MODEL_STATUS },
        { text: "⬅️ Back", action: Actions.SETTINGS }
      ]
    ]
  };
}

export function invalidSettingView(): BotView {
  return { text: "⚠️ Unknown setting. Use /settings to try again.", html: false };
}
