// types.ts

export interface FlightOffer {
  origin: string;
  destination: string;

  price: number;
  currency: string;

  durationMinutes: number;
  stops: number;
  departureAt: string; // local time at origin, e.g. 2026-10-20T06:15:00+02:00

  airline: string;
  flightNumber: string;
  link: string; // relative to aviasales.com, may be empty
}

export interface Deal extends FlightOffer {
  threshold: number;
}
