import { type FlightRecord, type FlightSearchQuery } from './flight';
import { type FlightProvider } from './flight-ports';
import { FlightCache, FlightError } from './flight-cache';

export interface FlightServiceDeps {
  provider: FlightProvider;
  cache: FlightCache;
}

export class FlightService {
  constructor(private readonly deps: FlightServiceDeps) {}

  /**
   * Queries the provider and appends its offers to the cache.
   * Returns only the flights the cache had not seen yet.
   */
  async search(query: FlightSearchQuery): Promise<FlightRecord[]> {
    if (!query.origin || !query.destination || !query.departureDate) {
      throw new FlightError('VALIDATION', 'origin, destination and departureDate are required');
    }

    const adults = query.adults ?? 1;
    if (!Number.isInteger(adults) || adults < 1) {
      throw new FlightError('VALIDATION', 'adults must be a positive integer');
    }

    const offers = await this.deps.provider.searchOffers({
      origin: query.origin,
      destination: query.destination,
      departureDate: query.departureDate,
      returnDate: query.returnDate || null,
      adults,
    });

    return this.deps.cache.append(offers);
  }
}
