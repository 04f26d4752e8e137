import { z } from 'zod';
import { formatPrice, parsePrice, type FlightRecord, type FlightSearchQuery } from '@faretrack/domain';
import { type SafeLogger } from '../logger';

const SegmentSchema = z.object({
  carrierCode: z.string().min(1),
  departure: z.object({ iataCode: z.string().min(1) }),
  arrival: z.object({ iataCode: z.string().min(1) }),
});

export const AmadeusOfferSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  itineraries: z.array(z.object({ segments: z.array(SegmentSchema).min(1) })).min(1),
  price: z.object({
    grandTotal: z.string().min(1),
    currency: z.string().min(1).default('USD'),
  }),
  validatingAirlineCodes: z.array(z.string()).min(1),
  travelerPricings: z.array(z.unknown()).min(1),
});

export const AmadeusOfferResponseSchema = z.object({
  data: z.array(z.unknown()).default([]),
});

export type AmadeusOffer = z.infer<typeof AmadeusOfferSchema>;

/**
 * Maps one raw offer to a flight record, or returns null (with a warning)
 * when the offer is incomplete or inconsistent.
 */
export function mapOffer(
  raw: unknown,
  query: Required<FlightSearchQuery>,
  logger: SafeLogger,
): FlightRecord | null {
  const parsed = AmadeusOfferSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { offerId: offerIdOf(raw), issues: parsed.error.issues.map((i) => i.path.join('.')) },
      'Skipping incomplete flight offer',
    );
    return null;
  }

  const offer = parsed.data;
  const segments = offer.itineraries[0].segments;
  const first = segments[0];
  const last = segments[segments.length - 1];

  // Stored prices must read back through parsePrice, or price filters never see them.
  const price = formatPrice(offer.price.grandTotal, offer.price.currency);
  if (!parsePrice(price)) {
    logger.warn({ offerId: offer.id }, 'Skipping flight offer with invalid price');
    return null;
  }

  if (first.departure.iataCode === last.arrival.iataCode) {
    logger.warn({ offerId: offer.id }, 'Skipping flight offer with identical origin and destination');
    return null;
  }

  return {
    airline: first.carrierCode,
    origin: first.departure.iataCode,
    destination: last.arrival.iataCode,
    departureDate: query.departureDate,
    returnDate: query.returnDate,
    price,
  };
}

export function mapOffers(
  raw: readonly unknown[],
  query: Required<FlightSearchQuery>,
  logger: SafeLogger,
): FlightRecord[] {
  const records: FlightRecord[] = [];
  for (const offer of raw) {
    const record = mapOffer(offer, query, logger);
    if (record) records.push(record);
  }
  return records;
}

function offerIdOf(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    return String(raw.id);
  }
  return 'unknown';
}
