import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";

import { resolveSettings } from "../src/config.ts";
import {
  DeliveryError,
  buildDealMessage,
  buildDigest,
  escapeHtml,
  formatDuration,
  notifyDeals,
  sendTelegram,
} from "../src/telegram.ts";
import type { Deal } from "../src/types.ts";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function deal(overrides: Partial<Deal> = {}): Deal {
  return {
    origin: "BUD",
    destination: "BCN",
    price: 29,
    currency: "EUR",
    durationMinutes: 145,
    stops: 0,
    departureAt: "2026-10-20T06:15:00+02:00",
    airline: "FR",
    flightNumber: "1234",
    link: "/search/BUD2010BCN1?t=FR&x=1",
    threshold: 40,
    ...overrides,
  };
}

const credentials = {
  aviasales_token: "test-aviasales-token",
  telegram_bot_token: "test-bot-token",
  telegram_chat_id: "12345",
};

describe("formatting", () => {
  it("escapes HTML special characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&lt;/a&gt;");
  });

  it("formats durations as hours and minutes", () => {
    expect(formatDuration(145)).toBe("2h25m");
    expect(formatDuration(60)).toBe("1h00m");
    expect(formatDuration(5)).toBe("0h05m");
  });

  it("builds a deal block with the booking link", () => {
    expect(buildDealMessage(deal())).toBe(
      [
        "✈️ <b>BUD → BCN</b> 🔥🔥",
        "📅 2026-10-20 06:15 | 2h25m | direct",
        "💰 <b>29 EUR</b> (limit 40 EUR)",
        "🛫 FR 1234",
        '🔗 <a href="https://www.aviasales.com/search/BUD2010BCN1?t=FR&amp;x=1">Book</a>',
      ].join("\n"),
    );
  });

  it("falls back to a Google Flights link and skips an empty carrier", () => {
    const msg = buildDealMessage(
      deal({ destination: "VIE", price: 39, stops: 1, airline: "", flightNumber: "", link: "", departureAt: "2026-10-21T18:40:00+02:00" }),
    );

    expect(msg.split("\n")).toEqual([
      "✈️ <b>BUD → VIE</b> 🔥",
      "📅 2026-10-21 18:40 | 2h25m | 1 stop(s)",
      "💰 <b>39 EUR</b> (limit 40 EUR)",
      '🔗 <a href="https://www.google.com/travel/flights?q=Flights%20from%20BUD%20to%20VIE%20on%202026-10-21%20one%20way">Book</a>',
    ]);
  });

  it("marks very cheap deals", () => {
    expect(buildDealMessage(deal({ price: 10 })).split("\n")[0]).toBe("✈️ <b>BUD → BCN</b> 🔥🔥🔥");
  });

  it("shows a placeholder for an unknown departure time", () => {
    expect(buildDealMessage(deal({ departureAt: "" })).split("\n")[1]).toBe("📅 ? | 2h25m | direct");
  });
});

describe("long or degenerate fields", () => {
  it("shortens an oversized carrier name", () => {
    const lines = buildDealMessage(deal({ airline: "A".repeat(5000) })).split("\n");

    expect(lines[3]).toBe(`🛫 ${"A".repeat(47)}…`);
  });

  it("falls back to the Google Flights link for an oversized booking link", () => {
    const lines = buildDealMessage(deal({ link: `/search/${"x".repeat(400)}` })).split("\n");

    expect(lines[4]).toBe(
      '🔗 <a href="https://www.google.com/travel/flights?q=Flights%20from%20BUD%20to%20BCN%20on%202026-10-20%20one%20way">Book</a>',
    );
  });

  it("keeps a deal with huge fields in the digest", () => {
    const d = deal({
      destination: '"'.repeat(5000),
      currency: '"'.repeat(5000),
      airline: "<".repeat(5000),
      departureAt: '"'.repeat(5000),
      link: "&".repeat(300),
    });

    const text = buildDigest([d], "BUD");

    expect(text).toBe(`🔔 <b>1 cheap flight(s) from BUD</b>\n\n${buildDealMessage(d)}`);
    expect(text.length).toBeLessThanOrEqual(4096);
  });

  it("marks a free fare under a zero threshold as the best kind of deal", () => {
    const lines = buildDealMessage(deal({ price: 0, threshold: 0 })).split("\n");

    expect(lines[0]).toBe("✈️ <b>BUD → BCN</b> 🔥🔥🔥");
    expect(lines[2]).toBe("💰 <b>0 EUR</b> (limit 0 EUR)");
  });
});

describe("buildDigest", () => {
  it("joins a header and every deal", () => {
    const a = deal();
    const b = deal({ destination: "VIE", price: 35 });

    expect(buildDigest([a, b], "BUD")).toBe(
      `🔔 <b>2 cheap flight(s) from BUD</b>\n\n${buildDealMessage(a)}\n\n${buildDealMessage(b)}`,
    );
  });

  it("stays within the Telegram limit and counts what was left out", () => {
    const deals = Array.from({ length: 100 }, (_, i) => deal({ destination: `D${String(i).padStart(2, "0")}` }));

    const text = buildDigest(deals, "BUD");
    const included = text.split("\n\n✈️ ").length - 1;

    expect(text.length).toBeLessThanOrEqual(4096);
    expect(included).toBeGreaterThan(0);
    expect(included).toBeLessThan(100);
    expect(text.endsWith(`\n\n… and ${100 - included} more`)).toBe(true);
  });
});

describe("sending", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  it("posts HTML to the bot's sendMessage endpoint", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { message_id: 1 } }));

    await sendTelegram({ botToken: "test-bot-token", chatId: "12345", html: "<b>hi</b>" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.telegram.org/bottest-bot-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "12345",
      text: "<b>hi</b>",
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  it("raises DeliveryError with Telegram's description when rejected", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ ok: false, error_code: 400, description: "Bad Request: chat not found" }, 400),
    );

    const call = sendTelegram({ botToken: "test-bot-token", chatId: "1", html: "x" });

    await expect(call).rejects.toBeInstanceOf(DeliveryError);
    await expect(call).rejects.toThrow("Telegram rejected message (HTTP 400): Bad Request: chat not found");
  });

  it("raises DeliveryError when the network fails", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(sendTelegram({ botToken: "test-bot-token", chatId: "1", html: "x" })).rejects.toThrow(
      "Telegram request failed: fetch failed",
    );
  });

  it("sends nothing when there are no deals", async () => {
    const settings = resolveSettings(credentials);

    await expect(notifyDeals({ settings, deals: [] })).resolves.toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("sends one digest in combined mode", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ ok: true, result: {} }));
    const settings = resolveSettings(credentials);
    const deals = [deal(), deal({ destination: "VIE" })];

    await expect(notifyDeals({ settings, deals })).resolves.toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).text).toBe(buildDigest(deals, "BUD"));
  });

  it("sends one message per deal in per-offer mode", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ ok: true, result: {} }));
    const settings = resolveSettings({ ...credentials, notify_mode: "per_offer" });
    const deals = [deal(), deal({ destination: "VIE" }), deal({ destination: "WAW" })];

    await expect(notifyDeals({ settings, deals, pauseMs: 0 })).resolves.toBe(3);
    const texts = fetchMock.mock.calls.map((c) => JSON.parse(String(c[1]?.body)).text);
    expect(texts).toEqual(deals.map(buildDealMessage));
  });

  it("pauses between per-offer messages", async () => {
    const pauseMs = 60;
    const sentAt: number[] = [];
    fetchMock.mockImplementation(async () => {
      sentAt.push(Date.now());
      return jsonResponse({ ok: true, result: {} });
    });
    const settings = resolveSettings({ ...credentials, notify_mode: "per_offer" });

    await notifyDeals({ settings, deals: [deal(), deal({ destination: "VIE" }), deal({ destination: "WAW" })], pauseMs });

    expect(sentAt).toHaveLength(3);
    expect(sentAt[1] - sentAt[0]).toBeGreaterThanOrEqual(pauseMs - 2);
    expect(sentAt[2] - sentAt[1]).toBeGreaterThanOrEqual(pauseMs - 2);
  });
});
