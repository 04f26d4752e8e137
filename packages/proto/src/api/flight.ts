import { z } from 'zod';

const IATA_AIRPORT_REGEX = /^[A-Z]{3}$/;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export const AirportCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(IATA_AIRPORT_REGEX, 'Airport code must be a three-letter IATA code');

export const TravelDateSchema = z.string().trim().regex(DATE_REGEX, 'Date must be formatted YYYY-MM-DD');

export const FlightSearchRequestSchema = z.object({
  origin: AirportCodeSchema,
  destination: AirportCodeSchema,
  departureDate: TravelDateSchema,
  // An empty return date means a one-way search.
  returnDate: z.preprocess((value) => (value === '' ? undefined : value), TravelDateSchema.nullish()),
  adults: z.coerce.number().int().min(1).max(9).default(1),
});

export const AirlineQuerySchema = z.object({
  airline_code: z.string().min(1, 'airline_code is required'),
});

export const OriginQuerySchema = z.object({
  origin_code: z.string().min(1, 'origin_code is required'),
});

/** Bounds stay strings here; non-numeric bounds are an invalid range, not a malformed request. */
export const PriceRangeQuerySchema = z.object({
  min: z.string({ required_error: 'min is required' }),
  max: z.string({ required_error: 'max is required' }),
  currency: z.string().trim().length(3).optional(),
});

export const FlightRecordSchema = z.object({
  airline: z.string(),
  origin: z.string(),
  destination: z.string(),
  departureDate: z.string(),
  returnDate: z.string().nullable(),
  price: z.string(),
});

export const FlightListResponseSchema = z.object({
  status: z.literal('success'),
  flights: z.array(FlightRecordSchema),
});

export type FlightSearchRequest = z.infer<typeof FlightSearchRequestSchema>;
export type AirlineQuery = z.infer<typeof AirlineQuerySchema>;
export type OriginQuery = z.infer<typeof OriginQuerySchema>;
export type PriceRangeQuery = z.infer<typeof PriceRangeQuerySchema>;
export type FlightListResponse = z.infer<typeof FlightListResponseSchema>;
