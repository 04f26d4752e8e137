import { type FlightRecord, type FlightSearchQuery } from './flight';

export interface FlightProvider {
  /** Resolves to normalized records; rejects with `ProviderError` on any provider failure. */
  searchOffers(query: Required<FlightSearchQuery>): Promise<FlightRecord[]>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** The provider rejected our credentials. Callers may treat it as any other `ProviderError`. */
export class ProviderAuthError extends ProviderError {
  constructor(message: string, status: number | null = null) {
    super(message, status);
    this.name = 'ProviderAuthError';
  }
}
