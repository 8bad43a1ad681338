// scanner.ts

import { AVIASALES_BASE_URL, getSearchDates } from "./config.ts";
import type { Settings } from "./config.ts";
import { AviasalesClient } from "./aviasales.ts";
import { filterDeals } from "./pricing.ts";
import { buildDealMessage, buildDigest, notifyDeals } from "./telegram.ts";
import type { Deal } from "./types.ts";

export interface ScanResult {
  offers: number;
  deals: Deal[];
  messagesSent: number;
}

/**
 * One pass: search the window, filter, notify. Any RequestError escapes before
 * Telegram is contacted.
 */
export async function runScan(args: {
  settings: Settings;
  dryRun?: boolean;
  now?: Date;
  client?: AviasalesClient;
  pauseMs?: number;
}): Promise<ScanResult> {
  const { settings } = args;
  const client = args.client ?? new AviasalesClient({ token: settings.aviasalesToken, baseUrl: AVIASALES_BASE_URL });
  const dates = getSearchDates(settings.daysAhead, args.now);

  console.log(`Origin: ${settings.origin}`);
  console.log(`Dates: ${dates[0]} to ${dates[dates.length - 1]} (${dates.length} day(s))`);
  console.log(
    `Threshold: ${settings.basePrice} ${settings.currency.toUpperCase()} up to ${settings.baseDurationMinutes} min, ` +
      `+${settings.priceIncrement} per ${settings.incrementMinutes} min${settings.directOnly ? ", direct only" : ""}`,
  );

  const offers = await client.searchWindow(settings, dates);
  const deals = filterDeals(offers, settings);

  console.log(`\nOffers: ${offers.length}  deals: ${deals.length}`);
  for (const d of deals) {
    console.log(`  deal: ${d.destination}  ${d.price.toFixed(0)}/${d.threshold.toFixed(0)}  ${d.departureAt.slice(0, 10)}  stops ${d.stops}`);
  }

  if (args.dryRun) {
    if (deals.length) {
      const preview = settings.notifyMode === "per_offer" ? deals.map(buildDealMessage) : [buildDigest(deals, settings.origin)];
      console.log(`\n[dry run] ${preview.length} message(s) not sent:\n`);
      console.log(preview.join("\n\n---\n\n"));
    }
    return { offers: offers.length, deals, messagesSent: 0 };
  }

  const messagesSent = await notifyDeals({ settings, deals, pauseMs: args.pauseMs });
  if (messagesSent) console.log(`Sent ${messagesSent} Telegram message(s)`);

  return { offers: offers.length, deals, messagesSent };
}
