// telegram.ts

import {
  AVIASALES_LINK_BASE,
  TELEGRAM_API_BASE,
  TELEGRAM_BETWEEN_MSG_MS,
  TELEGRAM_MAX_MESSAGE_LENGTH,
} from "./config.ts";
import type { Settings } from "./config.ts";
import { sleep } from "./aviasales.ts";
import type { Deal } from "./types.ts";

export class DeliveryError extends Error {
  status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = "DeliveryError";
    this.status = status;
  }
}

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export async function sendTelegram(args: {
  botToken: string;
  chatId: string;
  html: string;
  disablePreview?: boolean;
}): Promise<void> {
  const url = `${TELEGRAM_API_BASE}/bot${args.botToken}/sendMessage`;

  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        chat_id: args.chatId,
        text: args.html,
        parse_mode: "HTML",
        disable_web_page_preview: args.disablePreview ?? true,
      }),
    });
  } catch (e) {
    throw new DeliveryError(`Telegram request failed: ${e instanceof Error ? e.message : String(e)}`);
  }

  // Telegram answers { ok, description } on both success and failure
  const body: unknown = await res.json().catch(() => null);
  const ok = isRecord(body) && body.ok === true;
  if (!res.ok || !ok) {
    const description = isRecord(body) && typeof body.description === "string" ? body.description : "no description";
    throw new DeliveryError(`Telegram rejected message (HTTP ${res.status}): ${description}`, res.status);
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function buildGoogleFlightsLink(deal: Deal): string {
  const q = `Flights from ${deal.origin} to ${deal.destination} on ${deal.departureAt.slice(0, 10)} one way`;
  return `https://www.google.com/travel/flights?q=${encodeURIComponent(q)}`;
}

export function formatDuration(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${h}h${String(m).padStart(2, "0")}m`;
}

// Keeps one deal block far below TELEGRAM_MAX_MESSAGE_LENGTH even after escaping
export const MAX_FIELD_LENGTH = 48;
export const MAX_LINK_LENGTH = 300;

export function clip(s: string, max: number = MAX_FIELD_LENGTH): string {
  return s.length > max ? `${s.slice(0, max - 1)}…` : s;
}

export function buildDealMessage(input: Deal): string {
  const deal: Deal = {
    ...input,
    origin: clip(input.origin),
    destination: clip(input.destination),
    currency: clip(input.currency),
  };

  // a zero threshold only admits free fares
  const ratio = deal.threshold > 0 ? deal.price / deal.threshold : 0;
  const fire = ratio < 0.6 ? "🔥🔥🔥" : ratio < 0.8 ? "🔥🔥" : "🔥";

  const dep = deal.departureAt ? deal.departureAt.slice(0, 16).replace("T", " ") : "?";
  const stops = deal.stops === 0 ? "direct" : `${deal.stops} stop(s)`;
  const link = deal.link && deal.link.length <= MAX_LINK_LENGTH
    ? `${AVIASALES_LINK_BASE}${deal.link}`
    : buildGoogleFlightsLink(deal);
  const carrier = clip([deal.airline, deal.flightNumber].filter(Boolean).join(" "));

  const lines = [
    `✈️ <b>${escapeHtml(deal.origin)} → ${escapeHtml(deal.destination)}</b> ${fire}`,
    `📅 ${escapeHtml(dep)} | ${formatDuration(deal.durationMinutes)} | ${stops}`,
    `💰 <b>${deal.price.toFixed(0)} ${escapeHtml(deal.currency)}</b> (limit ${deal.threshold.toFixed(0)} ${escapeHtml(deal.currency)})`,
  ];
  if (carrier) lines.push(`🛫 ${escapeHtml(carrier)}`);
  lines.push(`🔗 <a href="${escapeHtml(link)}">Book</a>`);
  return lines.join("\n");
}

/**
 * One message for the whole run. Deals are appended whole until the next one
 * would push the text past Telegram's limit; the rest are counted instead.
 */
export function buildDigest(deals: Deal[], origin: string): string {
  let text = `🔔 <b>${deals.length} cheap flight(s) from ${escapeHtml(origin)}</b>`;

  for (let i = 0; i < deals.length; i++) {
    const block = `\n\n${buildDealMessage(deals[i])}`;
    const remainingAfter = deals.length - i - 1;
    const tail = remainingAfter > 0 ? moreLine(remainingAfter) : "";

    if (text.length + block.length + tail.length > TELEGRAM_MAX_MESSAGE_LENGTH) {
      text += moreLine(deals.length - i);
      break;
    }
    text += block;
  }

  return text;
}

function moreLine(count: number): string {
  return `\n\n… and ${count} more`;
}

/** Send the deals to the configured chat. Returns the number of messages sent. */
export async function notifyDeals(args: {
  settings: Pick<Settings, "origin" | "notifyMode" | "telegramBotToken" | "telegramChatId">;
  deals: Deal[];
  pauseMs?: number;
}): Promise<number> {
  const { settings, deals } = args;
  if (deals.length === 0) return 0;

  const messages = settings.notifyMode === "per_offer"
    ? deals.map(buildDealMessage)
    : [buildDigest(deals, settings.origin)];

  const pauseMs = args.pauseMs ?? TELEGRAM_BETWEEN_MSG_MS;
  for (let i = 0; i < messages.length; i++) {
    if (i > 0 && pauseMs > 0) await sleep(pauseMs);
    await sendTelegram({
      botToken: settings.telegramBotToken,
      chatId: settings.telegramChatId,
      html: messages[i],
    });
  }

  return messages.length;
}
