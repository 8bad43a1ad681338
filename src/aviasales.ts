// aviasales.ts

import { z } from "zod";

import { MIN_REQUEST_GAP_MS } from "./config.ts";
import type { Settings } from "./config.ts";
import type { FlightOffer } from "./types.ts";

const ticketSchema = z.object({
  origin: z.string().optional(),
  destination: z.string(),
  price: z.number(),
  airline: z.string().default(""),
  flight_number: z.union([z.string(), z.number()]).transform(String).default(""),
  departure_at: z.string().default(""),
  transfers: z.number().int().nonnegative().default(0),
  duration: z.number().optional(),
  duration_to: z.number().optional(),
  link: z.string().default(""),
});

const pricesResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(ticketSchema).nullish(),
  currency: z.string().optional(),
  error: z.string().nullish(),
});

export type AviasalesTicket = z.infer<typeof ticketSchema>;

export class AviasalesClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly minGapMs: number;

  private lastRequestAt = 0;

  constructor(args: { token: string; baseUrl: string; minGapMs?: number }) {
    this.token = args.token;
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.minGapMs = args.minGapMs ?? MIN_REQUEST_GAP_MS;
  }

  async fetchPricesForDate(args: {
    origin: string;
    departureDate: string;
    currency: string;
    market: string;
    limit: number;
    directOnly?: boolean;
  }): Promise<FlightOffer[]> {
    const params = new URLSearchParams({
      origin: args.origin,
      departure_at: args.departureDate,
      one_way: "true",
      currency: args.currency,
      market: args.market,
      limit: String(args.limit),
      sorting: "price",
      token: this.token,
    });
    if (args.directOnly) params.set("direct", "true");

    const url = `${this.baseUrl}/aviasales/v3/prices_for_dates?${params.toString()}`;
    const body = await this.getJson(url);

    const parsed = pricesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestError(`Unexpected response for ${args.origin} ${args.departureDate}`);
    }
    if (!parsed.data.success) {
      throw new RequestError(`Search failed for ${args.origin} ${args.departureDate}: ${parsed.data.error ?? "unknown error"}`);
    }

    const currency = (parsed.data.currency ?? args.currency).toUpperCase();
    return (parsed.data.data ?? []).map((t) => toOffer(t, args.origin, currency));
  }

  /** Query every departure date of the window in order and collect the offers. */
  async searchWindow(settings: Settings, dates: string[]): Promise<FlightOffer[]> {
    const offers: FlightOffer[] = [];
    for (const date of dates) {
      const rows = await this.fetchPricesForDate({
        origin: settings.origin,
        departureDate: date,
        currency: settings.currency,
        market: settings.market,
        limit: settings.limit,
        directOnly: settings.directOnly,
      });
      console.log(`  ${date}: ${rows.length} offer(s)`);
      offers.push(...rows);
    }
    return offers;
  }

  private async getJson(url: string): Promise<unknown> {
    await this.throttle();

    let res: Response;
    try {
      res = await fetch(url, { headers: { Accept: "application/json" } });
    } catch (e) {
      throw new RequestError(`Flight search request failed: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (!res.ok) {
      throw new RequestError(`Flight search returned HTTP ${res.status}`, res.status);
    }

    try {
      return await res.json();
    } catch {
      throw new RequestError("Flight search returned a non-JSON body", res.status);
    }
  }

  private async throttle(): Promise<void> {
    const now = Date.now();
    const wait = this.lastRequestAt + this.minGapMs - now;
    if (wait > 0) await sleep(wait);
    this.lastRequestAt = Date.now();
  }
}

function toOffer(t: AviasalesTicket, origin: string, currency: string): FlightOffer {
  return {
    origin: t.origin ?? origin,
    destination: t.destination,
    price: t.price,
    currency,
    durationMinutes: t.duration_to || t.duration || 0,
    stops: t.transfers,
    departureAt: t.departure_at,
    airline: t.airline,
    flightNumber: t.flight_number,
    link: t.link,
  };
}

export class RequestError extends Error {
  status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = "RequestError";
    this.status = status;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
