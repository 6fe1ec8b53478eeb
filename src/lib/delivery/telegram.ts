/**
 * Telegram delivery through the Bot API sendMessage endpoint
 */

import { z } from "zod";
import { logger } from "../logger";
import type { Settings } from "../../config/settings";
import { PREFERENCE_KEYS } from "../../config/preferences";
import type { FetchLike } from "../sources/types";
import type { DeliveryChannel } from "./types";

export const TELEGRAM_API_BASE = "https://api.telegram.org";
export const DEFAULT_CHUNK_SIZE = 4000;

const SendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

/**
 * Split text into chunks of at most `size` characters, breaking on line
 * boundaries. A single line longer than `size` is cut into pieces.
 */
export function chunkMessage(text: string, size: number = DEFAULT_CHUNK_SIZE): string[] {
  if (size < 1) {
    throw new Error(`Chunk size must be positive, got ${size}`);
  }

  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    if (current) {
      chunks.push(current);
      current = "";
    }
  };

  for (const line of text.split("\n")) {
    if (line.length > size) {
      flush();
      for (let i = 0; i < line.length; i += size) {
        chunks.push(line.slice(i, i + size));
      }
      continue;
    }

    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > size) {
      flush();
      current = line;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks;
}

export interface TelegramOptions {
  botToken?: string;
  chatId?: string;
  enabled: boolean;
  chunkSize?: number;
  fetchFn?: FetchLike;
}

export class TelegramChannel implements DeliveryChannel {
  readonly name = "telegram";
  readonly preferenceKey = PREFERENCE_KEYS.DELIVERY_TELEGRAM_ENABLED;
  readonly enabled: boolean;
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: TelegramOptions) {
    this.enabled = options.enabled && Boolean(options.botToken && options.chatId);
    if (options.enabled && !this.enabled) {
      logger.warn("Telegram delivery enabled but TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID is missing");
    }
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async send(subject: string, content: string): Promise<void> {
    const { botToken, chatId } = this.options;
    if (!botToken || !chatId) {
      throw new Error("Telegram is not configured");
    }

    const chunks = chunkMessage(`${subject}\n\n${content}`, this.options.chunkSize);
    const url = `${TELEGRAM_API_BASE}/bot${botToken}/sendMessage`;

    for (const [i, text] of chunks.entries()) {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: chatId, text, disable_web_page_preview: true }),
      });
      const body = SendMessageResponseSchema.safeParse(await response.json());
      if (!response.ok || !body.success || !body.data.ok) {
        const reason = body.success ? body.data.description : undefined;
        throw new Error(
          `Telegram sendMessage failed on chunk ${i + 1}/${chunks.length}: ${reason ?? `status ${response.status}`}`
        );
      }
    }

    logger.info(`Telegram digest sent in ${chunks.length} message(s)`);
  }
}

export function createTelegramChannel(settings: Settings, fetchFn?: FetchLike): TelegramChannel {
  return new TelegramChannel({
    botToken: settings.TELEGRAM_BOT_TOKEN,
    chatId: settings.TELEGRAM_CHAT_ID,
    enabled: settings.TELEGRAM_ENABLED,
    chunkSize: settings.TELEGRAM_CHUNK_SIZE,
    fetchFn,
  });
}
