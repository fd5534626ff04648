import {
  isSummaryMode,
  isSummaryTone,
  type SettingsRepository
} from "../db/settingsRepository";
import type { HandleInput } from "../jobs/orchestrator";
import { RunStatus, type RunOutcome } from "../jobs/types";
import type { ModelStatus } from "../services/modelManager";
import { looksLikeVideoLink } from "../services/urlExtractor";
import { splitMessage } from "./splitMessage";
import {
  RUN_CANCELLED_TEXT,
  aboutView,
  cancelledView,
  invalidSettingView,
  menuView,
  modelStatusView,
  processingView,
  promptForUrlView,
  settingsUpdatedView,
  settingsView,
  type BotView
} from "./views";

/** The two things the controller needs from a chat: post a message and rewrite one it posted. */
export interface ChatSurface {
  send(view: BotView): Promise<number>;
  edit(messageId: number, view: BotView): Promise<void>;
}

export interface PipelineRunner {
  handle(input: HandleInput): Promise<RunOutcome>;
}

export interface ModelDirectory {
  readonly currentModel: string;
  getStatus(): ModelStatus[];
}

export interface BotControllerDeps {
  pipeline: PipelineRunner;
  settings: SettingsRepository;
  models: ModelDirectory;
  modelNames: readonly string[];
}

/**
 * Chat logic that does not depend on the messaging platform. Tracks which senders
 * were asked for a link and owns one cancellation handle per sender.
 */
export class BotController {
  private awaitingUrl = new Set<string>();
  private inFlight = new Map<string, AbortController>();

  constructor(private deps: BotControllerDeps) {}

  /** The sender tapped "Summarize" or sent /summarize. */
  requestUrl(senderId: string): BotView {
    this.awaitingUrl.add(senderId);
    return promptForUrlView();
  }

  /**
   * Routes free text: a link (or any text after a link prompt) starts a summary run,
   * anything else gets the short menu.
   */
  async handleText(senderId: string, text: string, surface: ChatSurface): Promise<void> {
    const prompted = this.awaitingUrl.delete(senderId);

    if (prompted || looksLikeVideoLink(text)) {
      await this.summarize(senderId, text, surface);
      return;
    }

    await surface.send(menuView());
  }

  /**
   * Runs the pipeline for one message. A newer message from the same sender
   * cancels the older run. Replies longer than one message are split, the first
   * part replacing the progress message.
   */
  async summarize(senderId: string, text: string, surface: ChatSurface): Promise<RunOutcome> {
    this.inFlight.get(senderId)?.abort();
    const controller = new AbortController();
    this.inFlight.set(senderId, controller);

    try {
      const request = await this.deps.settings.get(senderId);
      const progressId = await surface.send(processingView());

      const outcome = await this.deps.pipeline.handle({
        senderId,
        text,
        request,
        signal: controller.signal,
        reply: async (replyText) => {
          const [first, ...rest] = splitMessage(replyText);
          await surface.edit(progressId, { text: first, html: false });
          for (const part of rest) {
            await surface.send({ text: part, html: false });
          }
        }
      });

      if (outcome.status === RunStatus.CANCELLED) {
        await surface.edit(progressId, { text: RUN_CANCELLED_TEXT, html: false });
      }

      return outcome;
    } finally {
      if (this.inFlight.get(senderId) === controller) {
        this.inFlight.delete(senderId);
      }
    }
  }

  /** Clears a pending link prompt and aborts the sender's running summary, if any. */
  cancel(senderId: string): BotView {
    this.awaitingUrl.delete(senderId);
    const controller = this.inFlight.get(senderId);
    if (controller) {
      controller.abort();
      this.inFlight.delete(senderId);
    }
    return cancelledView();
  }

  async showSettings(senderId: string): Promise<BotView> {
    const settings = await this.deps.settings.get(senderId);
    return settingsView(settings, this.deps.models.currentModel);
  }

  async updateMode(senderId: string, value: string): Promise<BotView> {
    if (!isSummaryMode(value)) return invalidSettingView();
    const settings = await this.deps.settings.update(senderId, { mode: value });
    return settingsUpdatedView("Summary mode", settings);
  }

  async updateTone(senderId: string, value: string): Promise<BotView> {
    if (!isSummaryTone(value)) return invalidSettingView();
    const settings = await this.deps.settings.update(senderId, { tone: value });
    return settingsUpdatedView("Tone", settings);
  }

  modelStatus(): BotView {
    return modelStatusView(this.deps.models.getStatus());
  }

  about(): BotView {
    return aboutView(this.deps.modelNames);
  }
}
