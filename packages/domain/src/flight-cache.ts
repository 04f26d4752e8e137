import { type FlightRecord, isSameFlight, parsePrice } from './flight';

/**
 * Process-local store of flight records collected by searches.
 *
 * Every method is synchronous, so a mutation always runs to completion on the
 * event loop before another mutation or a filter can observe the collection.
 * Results are copies; callers cannot reach the stored records.
 */
export class FlightCache {
  private records: FlightRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  /** Stores the records not seen before and returns exactly those, in input order. */
  append(incoming: readonly FlightRecord[]): FlightRecord[] {
    const inserted: FlightRecord[] = [];
    for (const record of incoming) {
      if (this.records.some((existing) => isSameFlight(existing, record))) continue;
      const copy = { ...record };
      this.records.push(copy);
      inserted.push({ ...copy });
    }
    return inserted;
  }

  list(): FlightRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  clear(): void {
    this.records = [];
  }

  filterByAirline(code: string): FlightRecord[] {
    return this.select((record) => record.airline === code);
  }

  filterByOrigin(code: string): FlightRecord[] {
    return this.select((record) => record.origin === code);
  }

  /**
   * Records priced within `[min, max]`. With `currency`, records priced in any
   * other currency are left out.
   */
  filterByPriceRange(min: number, max: number, currency?: string): FlightRecord[] {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new FlightError('INVALID_RANGE', 'Invalid price range');
    }
    const wanted = currency?.toUpperCase();

    return this.select((record) => {
      const price = parsePrice(record.price);
      if (!price) return false;
      if (wanted !== undefined && price.currency !== wanted) return false;
      return price.amount >= min && price.amount <= max;
    });
  }

  private select(predicate: (record: FlightRecord) => boolean): FlightRecord[] {
    return this.records.filter(predicate).map((record) => ({ ...record }));
  }
}

export class FlightError extends Error {
  constructor(
    public readonly kind: 'INVALID_RANGE' | 'VALIDATION',
    message: string,
  ) {
    super(message);
    this.name = 'FlightError';
  }
}
