import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@faretrack/shared';
import {
  FlightError,
  ProviderError,
  ProviderAuthError,
  type FlightCache,
  type FlightRecord,
  type FlightService,
} from '@faretrack/domain';
import {
  FlightSearchRequestSchema,
  AirlineQuerySchema,
  OriginQuerySchema,
  PriceRangeQuerySchema,
} from '@faretrack/proto';

interface FlightRouteDeps {
  flightService: FlightService;
  flightCache: FlightCache;
}

function mapFlightError(err: unknown): never {
  if (err instanceof FlightError) {
    const code = err.kind === 'INVALID_RANGE' ? ErrorCode.BAD_REQUEST : ErrorCode.VALIDATION;
    throw new AppError(code, err.message);
  }
  if (err instanceof ProviderError) {
    throw new AppError(ErrorCode.BAD_GATEWAY, 'Flight provider request failed', {
      providerStatus: err.status,
      authRejected: err instanceof ProviderAuthError,
    });
  }
  throw err;
}

function toBound(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function flightList(flights: FlightRecord[]) {
  return { status: 'success' as const, flights };
}

export function registerFlightRoutes(app: FastifyInstance, deps: FlightRouteDeps): void {
  const { flightService, flightCache } = deps;

  app.get('/api/flights', async (_request, reply) => {
    return reply.status(200).send(flightList(flightCache.list()));
  });

  app.post('/api/flights/clear', async (_request, reply) => {
    flightCache.clear();
    return reply.status(200).send({ status: 'success', message: 'All flights have been cleared' });
  });

  app.post('/api/flights/search', async (request, reply) => {
    const parsed = FlightSearchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'origin, destination and departureDate are required', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
    }

    try {
      const flights = await flightService.search(parsed.data);
      return reply.status(200).send(flightList(flights));
    } catch (err) {
      return mapFlightError(err);
    }
  });

  app.get('/api/flights/airline', async (request, reply) => {
    const parsed = AirlineQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'airline_code is required');
    }
    return reply.status(200).send(flightList(flightCache.filterByAirline(parsed.data.airline_code)));
  });

  app.get<{ Params: { airlineCode: string } }>('/api/flights/airline/:airlineCode', async (request, reply) => {
    const { airlineCode } = request.params;
    return reply.status(200).send(flightList(flightCache.filterByAirline(airlineCode)));
  });

  app.get('/api/flights/origin', async (request, reply) => {
    const parsed = OriginQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'origin_code is required');
    }
    return reply.status(200).send(flightList(flightCache.filterByOrigin(parsed.data.origin_code)));
  });

  app.get<{ Params: { originCode: string } }>('/api/flights/origin/:originCode', async (request, reply) => {
    const { originCode } = request.params;
    return reply.status(200).send(flightList(flightCache.filterByOrigin(originCode)));
  });

  app.get('/api/flights/price', async (request, reply) => {
    const parsed = PriceRangeQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, 'min and max are required');
    }

    try {
      const { min, max, currency } = parsed.data;
      const flights = flightCache.filterByPriceRange(toBound(min), toBound(max), currency);
      return reply.status(200).send(flightList(flights));
    } catch (err) {
      return mapFlightError(err);
    }
  });
}
