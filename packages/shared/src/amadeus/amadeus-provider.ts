import { z } from 'zod';
import {
  ProviderError,
  ProviderAuthError,
  type FlightProvider,
  type FlightRecord,
  type FlightSearchQuery,
} from '@faretrack/domain';
import { createLogger } from '../logger';
import { AmadeusOfferResponseSchema, mapOffers } from './offer-mapper';

const logger = createLogger({ name: 'amadeus' });

const TOKEN_PATH = '/v1/security/oauth2/token';
const OFFERS_PATH = '/v2/shopping/flight-offers';
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(1799),
});

export interface AmadeusProviderConfig {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  timeoutMs: number;
  currencyCode?: string;
  maxOffers?: number;
  fetchFn?: typeof fetch;
}

export class AmadeusFlightProvider implements FlightProvider {
  private readonly fetchFn: typeof fetch;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly config: AmadeusProviderConfig) {
    this.fetchFn = config.fetchFn ?? fetch;
  }

  async searchOffers(query: Required<FlightSearchQuery>): Promise<FlightRecord[]> {
    logger.info(
      {
        origin: query.origin,
        destination: query.destination,
        departureDate: query.departureDate,
        returnDate: query.returnDate,
        adults: query.adults,
      },
      'Searching flight offers',
    );

    const accessToken = await this.getAccessToken();

    const params = new URLSearchParams({
      originLocationCode: query.origin,
      destinationLocationCode: query.destination,
      departureDate: query.departureDate,
      adults: String(query.adults),
      currencyCode: this.config.currencyCode ?? 'USD',
      max: String(this.config.maxOffers ?? 50),
    });
    if (query.returnDate) {
      params.set('returnDate', query.returnDate);
    }

    const response = await this.send(`${this.config.baseUrl}${OFFERS_PATH}?${params.toString()}`, {
      method: 'GET',
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    if (response.status === 401) {
      this.token = null;
      logger.warn({ status: response.status }, 'Flight offer search rejected our access token');
      throw new ProviderAuthError('Flight provider rejected the access token', response.status);
    }
    if (!response.ok) {
      logger.error({ status: response.status }, 'Flight offer search failed');
      throw new ProviderError(`Flight offer search failed with status ${response.status}`, response.status);
    }

    const body = AmadeusOfferResponseSchema.safeParse(await this.readJson(response));
    if (!body.success) {
      throw new ProviderError('Flight provider returned an unexpected response', response.status);
    }

    const records = mapOffers(body.data.data, query, logger);
    logger.info({ offers: body.data.data.length, records: records.length }, 'Flight offers retrieved');
    return records;
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const response = await this.send(`${this.config.baseUrl}${TOKEN_PATH}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.config.apiKey,
        client_secret: this.config.apiSecret,
      }).toString(),
    });

    if (response.status === 400 || response.status === 401) {
      logger.error({ status: response.status }, 'Flight provider rejected our credentials');
      throw new ProviderAuthError('Flight provider rejected the API credentials', response.status);
    }
    if (!response.ok) {
      logger.error({ status: response.status }, 'Access token request failed');
      throw new ProviderError(`Access token request failed with status ${response.status}`, response.status);
    }

    const parsed = TokenResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new ProviderAuthError('Access token missing from provider response', response.status);
    }

    this.token = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    logger.debug({}, 'Access token retrieved');
    return this.token.value;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, {
        ...init,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error({ err: reason }, 'Flight provider unreachable');
      throw new ProviderError(`Flight provider unreachable: ${reason}`);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      throw new ProviderError('Flight provider returned invalid JSON', response.status);
    }
  }
}
