// pricing.ts

import type { Settings } from "./config.ts";
import type { Deal, FlightOffer } from "./types.ts";

type ThresholdSettings = Pick<
  Settings,
  "basePrice" | "baseDurationMinutes" | "priceIncrement" | "incrementMinutes"
>;

/**
 * Highest acceptable price for a flight of the given length. Each started
 * `incrementMinutes` step beyond `baseDurationMinutes` adds `priceIncrement`.
 */
export function maxPriceForDuration(durationMinutes: number, s: ThresholdSettings): number {
  if (durationMinutes <= s.baseDurationMinutes) return s.basePrice;
  const extraSteps = Math.ceil((durationMinutes - s.baseDurationMinutes) / s.incrementMinutes);
  return s.basePrice + extraSteps * s.priceIncrement;
}

export function buildDeal(
  offer: FlightOffer,
  s: ThresholdSettings & Pick<Settings, "directOnly">,
): Deal | null {
  if (!Number.isFinite(offer.durationMinutes) || offer.durationMinutes <= 0) return null;
  if (!Number.isFinite(offer.price)) return null;
  if (s.directOnly && offer.stops !== 0) return null;

  const threshold = maxPriceForDuration(offer.durationMinutes, s);
  if (offer.price > threshold) return null;

  return { ...offer, threshold };
}

export function filterDeals(
  offers: FlightOffer[],
  s: ThresholdSettings & Pick<Settings, "directOnly">,
): Deal[] {
  const deals: Deal[] = [];
  for (const offer of offers) {
    const deal = buildDeal(offer, s);
    if (deal) deals.push(deal);
  }
  return deals.sort((a, b) => a.price - b.price);
}
