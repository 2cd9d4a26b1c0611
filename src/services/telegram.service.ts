/**
 * Telegram Command Service
 *
 * Long-polls the Bot API and answers chat commands:
 * - /start, /help             Show help
 * - /whoami                   Show chat and user ids
 * - /status                   Bot state, position and breakers
 * - /paper [loops]            Run paper iterations and render each outcome
 * - /pair <t0> <t1> <dex> [fee]  Resolve a pair/pool address
 * - /kill [note]              Engage the kill switch
 * - /resume                   Clear breakers
 * - /pnl                      Realized PnL over 1h / 4h / 24h
 *
 * When TELEGRAM_ADMIN_ID is set only that user may run stateful commands.
 * With a live runner wired, /paper is refused: the bot's ledger follows the
 * executed position and only the runner may advance it.
 * A failed poll sleeps with backoff and retries; the loop ends on abort.
 */

import axios, { type AxiosInstance } from "axios";
import type { TelegramConfig } from "../config/schema";
import type { MicrostructureBot } from "../core/state-machine";
import { MalformedResponseError, toError } from "../errors/app.errors";
import { SUPPORTED_DEXES, type PairResolver } from "../integrations/pair-resolver";
import type { LiveRunner } from "../trading/live-runner";
import { formatBotStatus, formatOutcomes, formatPnlWindows } from "../telegram/reports";
import type { Logger } from "../utils/logger.util";
import { calculateBackoff, sleep as defaultSleep, type SleepFn } from "../utils/timing.util";

// ═══════════════════════════════════════════════════════════════════════════
// BOT API
// ═══════════════════════════════════════════════════════════════════════════

export interface TelegramMessage {
  chatId: number;
  chatType: string;
  fromId: number;
  text: string;
}

export interface TelegramUpdate {
  updateId: number;
  message?: TelegramMessage;
}

export interface TelegramApi {
  getUpdates(
    offset: number | undefined,
    timeoutS: number,
    signal?: AbortSignal,
  ): Promise<TelegramUpdate[]>;
  sendMessage(chatId: number | string, text: string): Promise<void>;
}

/** Long-poll timeout passed to getUpdates */
export const LONG_POLL_TIMEOUT_S = 30;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Bot API getUpdates payload -> updates. Messages without text are kept as
 * bare updates so the offset still advances past them.
 */
export function parseUpdates(payload: unknown): TelegramUpdate[] {
  if (!isRecord(payload) || payload.ok !== true || !Array.isArray(payload.result)) {
    throw new MalformedResponseError("getUpdates: unexpected payload", "telegram");
  }
  const updates: TelegramUpdate[] = [];
  for (const raw of payload.result) {
    if (!isRecord(raw) || typeof raw.update_id !== "number") continue;
    const msg = isRecord(raw.message) ? raw.message : isRecord(raw.channel_post) ? raw.channel_post : null;
    const chat = msg && isRecord(msg.chat) ? msg.chat : null;
    if (!msg || !chat || typeof chat.id !== "number" || typeof msg.text !== "string") {
      updates.push({ updateId: raw.update_id });
      continue;
    }
    const from = isRecord(msg.from) && typeof msg.from.id === "number" ? msg.from.id : 0;
    updates.push({
      updateId: raw.update_id,
      message: {
        chatId: chat.id,
        chatType: typeof chat.type === "string" ? chat.type : "private",
        fromId: from,
        text: msg.text,
      },
    });
  }
  return updates;
}

export class AxiosTelegramApi implements TelegramApi {
  private readonly http: AxiosInstance;

  constructor(botToken: string, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: `https://api.telegram.org/bot${botToken}`,
        timeout: (LONG_POLL_TIMEOUT_S + 5) * 1000,
      });
  }

  async getUpdates(
    offset: number | undefined,
    timeoutS: number,
    signal?: AbortSignal,
  ): Promise<TelegramUpdate[]> {
    const params: Record<string, number> = { timeout: timeoutS };
    if (offset !== undefined) params.offset = offset;
    const response = await this.http.get<unknown>("/getUpdates", { params, signal });
    return parseUpdates(response.data);
  }

  async sendMessage(chatId: number | string, text: string): Promise<void> {
    await this.http.post("/sendMessage", {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND SERVICE
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_PAPER_LOOPS = 1;
export const MAX_PAPER_LOOPS = 100;

const PAIR_USAGE = `Usage: /pair <token0> <token1> <dex> [fee_tier]\nDexes: ${SUPPORTED_DEXES.join(", ")}`;

export const HELP_TEXT = [
  "Commands:",
  "/whoami",
  "/status",
  "/paper [loops]",
  "/pair <token0> <token1> <dex> [fee_tier]",
  "/kill [note]",
  "/resume",
  "/pnl",
].join("\n");

export interface TelegramCommandServiceDeps {
  api: TelegramApi;
  bot: MicrostructureBot;
  config: Pick<TelegramConfig, "adminId" | "pollIntervalMs" | "alertChatId">;
  environment: string;
  resolver?: PairResolver;
  /** Live mode: the runner that owns trade execution for `bot` */
  runner?: LiveRunner;
  logger?: Logger;
  sleep?: SleepFn;
}

export class TelegramCommandService {
  private readonly deps: TelegramCommandServiceDeps;
  private readonly sleep: SleepFn;
  private offset: number | undefined;

  constructor(deps: TelegramCommandServiceDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Reply text for a message, or null when there is nothing to answer
   */
  async handleMessage(message: TelegramMessage): Promise<string | null> {
    const text = message.text.trim();
    if (!text.startsWith("/")) return null;

    const [rawCommand = "", ...args] = text.split(/\s+/);
    const command = rawCommand.split("@")[0]?.toLowerCase() ?? "";
    const { bot } = this.deps;

    switch (command) {
      case "/start":
      case "/help":
        return HELP_TEXT;
      case "/whoami":
        return `chat_id=${message.chatId} type=${message.chatType} user_id=${message.fromId}`;
      default:
        break;
    }

    if (!this.authorized(message)) {
      return "Unauthorized. Set TELEGRAM_ADMIN_ID to allow your user.";
    }

    switch (command) {
      case "/status":
        return formatBotStatus(bot.status(), this.deps.environment);
      case "/paper":
        return this.paper(args[0]);
      case "/pair":
        return this.pair(args);
      case "/kill": {
        const note = args.join(" ") || undefined;
        await bot.kill(note);
        return `🛑 Kill switch engaged${note ? `: ${note}` : ""}. Use /resume to clear.`;
      }
      case "/resume":
        await bot.resume();
        return "✅ Breakers cleared, trading resumed.";
      case "/pnl":
        return formatPnlWindows(bot.pnlWindows());
      default:
        return "Unknown command. Use /help.";
    }
  }

  /**
   * Long-poll until `signal` aborts
   */
  async poll(signal: AbortSignal): Promise<void> {
    const { api, logger } = this.deps;
    let failures = 0;
    logger?.info("[Telegram] Command polling started");

    while (!signal.aborted) {
      try {
        const updates = await api.getUpdates(this.offset, LONG_POLL_TIMEOUT_S, signal);
        failures = 0;
        for (const update of updates) {
          this.offset = Math.max(this.offset ?? 0, update.updateId + 1);
          if (update.message) await this.respond(update.message);
        }
      } catch (err) {
        if (signal.aborted) break;
        failures++;
        const delay = calculateBackoff(failures - 1, {
          baseDelayMs: this.deps.config.pollIntervalMs,
          maxDelayMs: 30_000,
          jitterFactor: 0.3,
        });
        logger?.warn(`[Telegram] Poll failed (${toError(err).message}), retrying in ${delay}ms`);
        await this.sleep(delay, signal);
      }
    }
    logger?.info("[Telegram] Command polling stopped");
  }

  /**
   * Send to the alert chat. Never throws.
   */
  async sendAlert(text: string): Promise<boolean> {
    const chatId = this.deps.config.alertChatId;
    if (!chatId) return false;
    try {
      await this.deps.api.sendMessage(chatId, text);
      return true;
    } catch (err) {
      this.deps.logger?.error(`[Telegram] Failed to send alert: ${toError(err).message}`);
      return false;
    }
  }

  private async respond(message: TelegramMessage): Promise<void> {
    let reply: string | null;
    try {
      reply = await this.handleMessage(message);
    } catch (err) {
      const error = toError(err);
      this.deps.logger?.error(`[Telegram] Command "${message.text}" failed: ${error.message}`, error);
      reply = `⚠️ Command failed: ${error.message}`;
    }
    if (reply === null) return;
    try {
      await this.deps.api.sendMessage(message.chatId, reply);
    } catch (err) {
      this.deps.logger?.warn(`[Telegram] Failed to send reply: ${toError(err).message}`);
    }
  }

  private authorized(message: TelegramMessage): boolean {
    const adminId = this.deps.config.adminId;
    return adminId === undefined || message.fromId === adminId;
  }

  private async paper(arg: string | undefined): Promise<string> {
    const { runner } = this.deps;
    if (runner) {
      const mode = runner.dryRun ? "dry run" : "live trading";
      return `/paper is disabled in live mode (${mode}): the scheduler drives the bot. Use /status.`;
    }
    let loops = DEFAULT_PAPER_LOOPS;
    if (arg !== undefined) {
      const parsed = Number.parseInt(arg, 10);
      if (Number.isFinite(parsed)) loops = Math.max(1, parsed);
    }
    loops = Math.min(loops, MAX_PAPER_LOOPS);
    const outcomes = await this.deps.bot.run(loops);
    return formatOutcomes(outcomes);
  }

  private async pair(args: readonly string[]): Promise<string> {
    const [token0, token1, dex, feeArg] = args;
    if (!token0 || !token1 || !dex) {
      return PAIR_USAGE;
    }
    const feeTier = feeArg === undefined ? undefined : Number.parseInt(feeArg, 10);
    if (feeTier !== undefined && !Number.isFinite(feeTier)) {
      return PAIR_USAGE;
    }
    if (!this.deps.resolver) return "Pair resolution is not configured.";
    const address = await this.deps.resolver.resolveAddress({
      token0,
      token1,
      dex,
      chainId: 1,
      feeTier,
    });
    return address ? `${dex} pair/pool: ${address}` : "Pair/pool not found.";
  }
}
