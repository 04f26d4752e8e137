export interface FlightRecord {
  airline: string;
  origin: string;
  destination: string;
  departureDate: string;
  returnDate: string | null;
  /** `"<amount> <currency>"`, e.g. `"250.00 USD"`. */
  price: string;
}

export interface FlightSearchQuery {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string | null;
  adults?: number;
}

export interface ParsedPrice {
  amount: number;
  currency: string;
}

const PRICE_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s+([A-Za-z]{3})\s*$/;

export function isSameFlight(a: FlightRecord, b: FlightRecord): boolean {
  return (
    a.airline === b.airline &&
    a.origin === b.origin &&
    a.destination === b.destination &&
    a.departureDate === b.departureDate &&
    a.returnDate === b.returnDate &&
    a.price === b.price
  );
}

export function parsePrice(price: string): ParsedPrice | null {
  const match = PRICE_PATTERN.exec(price);
  if (!match) return null;
  return { amount: Number(match[1]), currency: match[2].toUpperCase() };
}

export function formatPrice(amount: string, currency: string): string {
  return `${amount} ${currency}`;
}
