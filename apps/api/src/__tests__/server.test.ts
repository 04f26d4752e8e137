import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { type FastifyInstance } from 'fastify';
import {
  AuthService,
  FlightCache,
  FlightService,
  ProviderError,
  type FlightProvider,
  type FlightRecord,
  type PasswordHasher,
  type User,
  type UserRepository,
} from '@faretrack/domain';
import { MessageResponseSchema } from '@faretrack/proto';
import { buildServer } from '../server';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, User>();
  private nextId = 1;

  async create(
    _tx: unknown,
    user: { username: string; salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<User | null> {
    if (this.users.has(user.username)) return null;
    const now = new Date();
    const created: User = { id: String(this.nextId++), ...user, createdAt: now, updatedAt: now };
    this.users.set(user.username, created);
    return created;
  }

  async findByUsername(_tx: unknown, username: string): Promise<User | null> {
    return this.users.get(username) ?? null;
  }

  async updateCredentials(
    _tx: unknown,
    id: string,
    credentials: { salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<void> {
    for (const [username, user] of this.users) {
      if (user.id === id) {
        this.users.set(username, { ...user, ...credentials, updatedAt: new Date() });
      }
    }
  }
}

class FakePasswordHasher implements PasswordHasher {
  private counter = 0;

  generateSalt(): Uint8Array {
    return encoder.encode(`salt-${++this.counter}`);
  }

  async hash(password: string, salt: Uint8Array): Promise<Uint8Array> {
    return encoder.encode(`${decoder.decode(salt)}:${password}`);
  }

  async verify(password: string, salt: Uint8Array, digest: Uint8Array): Promise<boolean> {
    return decoder.decode(digest) === `${decoder.decode(salt)}:${password}`;
  }
}

const OFFER: FlightRecord = {
  airline: 'AA',
  origin: 'JFK',
  destination: 'LAX',
  departureDate: '2024-12-20',
  returnDate: '2024-12-27',
  price: '250.00 USD',
};

const SEARCH_BODY = {
  origin: 'jfk',
  destination: 'lax',
  departureDate: '2024-12-20',
  returnDate: '2024-12-27',
};

describe('API server', () => {
  let app: FastifyInstance;
  let provider: FlightProvider;
  let flightCache: FlightCache;
  let checkDatabase: () => Promise<void>;

  beforeEach(() => {
    provider = { searchOffers: vi.fn(async () => [{ ...OFFER }]) };
    flightCache = new FlightCache();
    checkDatabase = vi.fn(async () => {});

    app = buildServer({
      authService: new AuthService({
        userRepo: new InMemoryUserRepository(),
        passwordHasher: new FakePasswordHasher(),
        withTransaction: async (fn) => fn({}),
      }),
      flightService: new FlightService({ provider, cache: flightCache }),
      flightCache,
      checkDatabase,
      authRateLimit: { windowMs: 60_000, maxRequests: 100 },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('health', () => {
    it('GET /api/health reports healthy', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'healthy' });
    });

    it('GET /api/db-check reports a reachable database', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/db-check' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ database_status: 'healthy' });
    });

    it('GET /api/db-check reports an unreachable database', async () => {
      vi.mocked(checkDatabase).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      const res = await app.inject({ method: 'GET', url: '/api/db-check' });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        error: 'Database check failed',
        code: 'SERVICE_UNAVAILABLE',
        database_status: 'unhealthy',
      });
    });
  });

  describe('accounts', () => {
    async function createAccount(username: string, password: string) {
      return app.inject({ method: 'POST', url: '/create-account', payload: { username, password } });
    }

    it('creates an account', async () => {
      const res = await createAccount('testuser', 'pass1');
      expect(res.statusCode).toBe(201);
      expect(MessageResponseSchema.parse(res.json())).toEqual({ message: 'Account created successfully' });
    });

    it('rejects a duplicate username with 409', async () => {
      await createAccount('testuser', 'pass1');

      const res = await createAccount('testuser', 'other');
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'Username already exists', code: 'CONFLICT' });
    });

    it('treats usernames as case-sensitive', async () => {
      await createAccount('testuser', 'pass1');

      const res = await createAccount('TestUser', 'pass1');
      expect(res.statusCode).toBe(201);
    });

    it('rejects a missing password with 400', async () => {
      const res = await app.inject({ method: 'POST', url: '/create-account', payload: { username: 'u' } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'Username and password are required', code: 'VALIDATION' });
    });

    it('logs in with the right password only', async () => {
      await createAccount('testuser', 'pass1');

      const ok = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username: 'testuser', password: 'pass1' },
      });
      expect(ok.statusCode).toBe(200);
      expect(ok.json()).toEqual({ message: 'Login successful' });

      const bad = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username: 'testuser', password: 'wrong' },
      });
      expect(bad.statusCode).toBe(401);
      expect(bad.json()).toEqual({ error: 'Invalid username or password', code: 'UNAUTHORIZED' });
    });

    it('answers an unknown user the same as a wrong password', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username: 'nobody', password: 'pass1' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Invalid username or password', code: 'UNAUTHORIZED' });
    });

    it('updates the password so only the new one logs in', async () => {
      await createAccount('testuser', 'pass1');

      const update = await app.inject({
        method: 'PUT',
        url: '/update-password',
        payload: { username: 'testuser', current_password: 'pass1', new_password: 'pass2' },
      });
      expect(update.statusCode).toBe(200);
      expect(update.json()).toEqual({ message: 'Password updated successfully' });

      const oldLogin = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username: 'testuser', password: 'pass1' },
      });
      expect(oldLogin.statusCode).toBe(401);

      const newLogin = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { username: 'testuser', password: 'pass2' },
      });
      expect(newLogin.statusCode).toBe(200);
    });

    it('rejects a password update with the wrong current password', async () => {
      await createAccount('testuser', 'pass1');

      const res = await app.inject({
        method: 'PUT',
        url: '/update-password',
        payload: { username: 'testuser', current_password: 'nope', new_password: 'pass2' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Current password is incorrect', code: 'UNAUTHORIZED' });
    });

    it('rejects a password update for an unknown user with 404', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/update-password',
        payload: { username: 'ghost', current_password: 'a', new_password: 'b' },
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'User not found', code: 'NOT_FOUND' });
    });

    it('rejects a password update with missing fields', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/update-password',
        payload: { username: 'testuser', current_password: 'pass1' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'All fields are required', code: 'VALIDATION' });
    });
  });

  describe('rate limiting', () => {
    it('throttles account routes per client', async () => {
      await app.close();
      app = buildServer({
        authService: new AuthService({
          userRepo: new InMemoryUserRepository(),
          passwordHasher: new FakePasswordHasher(),
          withTransaction: async (fn) => fn({}),
        }),
        flightService: new FlightService({ provider, cache: flightCache }),
        flightCache,
        checkDatabase,
        authRateLimit: { windowMs: 60_000, maxRequests: 2 },
      });

      const login = () =>
        app.inject({ method: 'POST', url: '/login', payload: { username: 'a', password: 'b' } });

      expect((await login()).statusCode).toBe(401);
      expect((await login()).statusCode).toBe(401);

      const limited = await login();
      expect(limited.statusCode).toBe(429);
      expect(limited.headers['retry-after']).toBe('60');
      expect(limited.json()).toMatchObject({
        error: 'Too many requests, please try again later',
        code: 'RATE_LIMITED',
      });
    });
  });

  describe('flights', () => {
    it('searches, caches and lists flights', async () => {
      const search = await app.inject({ method: 'POST', url: '/api/flights/search', payload: SEARCH_BODY });
      expect(search.statusCode).toBe(200);
      expect(search.json()).toEqual({ status: 'success', flights: [OFFER] });
      expect(provider.searchOffers).toHaveBeenCalledWith({
        origin: 'JFK',
        destination: 'LAX',
        departureDate: '2024-12-20',
        returnDate: '2024-12-27',
        adults: 1,
      });

      const list = await app.inject({ method: 'GET', url: '/api/flights' });
      expect(list.json()).toEqual({ status: 'success', flights: [OFFER] });
    });

    it('searches one-way when the return date is empty', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/flights/search',
        payload: { ...SEARCH_BODY, returnDate: '' },
      });
      expect(res.statusCode).toBe(200);
      expect(provider.searchOffers).toHaveBeenCalledWith({
        origin: 'JFK',
        destination: 'LAX',
        departureDate: '2024-12-20',
        returnDate: null,
        adults: 1,
      });
    });

    it('returns only flights not already cached', async () => {
      await app.inject({ method: 'POST', url: '/api/flights/search', payload: SEARCH_BODY });

      const again = await app.inject({ method: 'POST', url: '/api/flights/search', payload: SEARCH_BODY });
      expect(again.json()).toEqual({ status: 'success', flights: [] });
      expect(flightCache.size).toBe(1);
    });

    it('rejects a search without a departure date', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/flights/search',
        payload: { origin: 'JFK', destination: 'LAX' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        error: 'origin, destination and departureDate are required',
        code: 'VALIDATION',
      });
      expect(provider.searchOffers).not.toHaveBeenCalled();
    });

    it('maps a provider failure to 502', async () => {
      vi.mocked(provider.searchOffers).mockRejectedValueOnce(new ProviderError('upstream down', 500));

      const res = await app.inject({ method: 'POST', url: '/api/flights/search', payload: SEARCH_BODY });
      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({
        error: 'Flight provider request failed',
        code: 'BAD_GATEWAY',
        providerStatus: 500,
        authRejected: false,
      });
      expect(flightCache.size).toBe(0);
    });

    describe('filters', () => {
      beforeEach(() => {
        flightCache.append([
          OFFER,
          { ...OFFER, airline: 'DL', origin: 'BOS', price: '120.00 USD' },
        ]);
      });

      it('filters by airline query parameter', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/airline?airline_code=DL' });
        expect(res.statusCode).toBe(200);
        expect(res.json().flights.map((f: FlightRecord) => f.airline)).toEqual(['DL']);
      });

      it('filters by airline path segment', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/airline/AA' });
        expect(res.json().flights).toEqual([OFFER]);
      });

      it('matches airline codes exactly, without trimming', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/airline?airline_code=%20AA%20' });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ status: 'success', flights: [] });
      });

      it('requires airline_code', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/airline' });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'airline_code is required', code: 'VALIDATION' });
      });

      it('filters by origin', async () => {
        const byQuery = await app.inject({ method: 'GET', url: '/api/flights/origin?origin_code=BOS' });
        expect(byQuery.json().flights.map((f: FlightRecord) => f.airline)).toEqual(['DL']);

        const byPath = await app.inject({ method: 'GET', url: '/api/flights/origin/JFK' });
        expect(byPath.json().flights).toEqual([OFFER]);
      });

      it('filters by inclusive price range', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/price?min=120&max=250' });
        expect(res.statusCode).toBe(200);
        expect(res.json().flights).toHaveLength(2);

        const narrow = await app.inject({ method: 'GET', url: '/api/flights/price?min=200&max=300' });
        expect(narrow.json().flights).toEqual([OFFER]);
      });

      it('rejects an inverted price range', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/price?min=500&max=100' });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'Invalid price range', code: 'BAD_REQUEST' });
      });

      it('rejects a non-numeric bound', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/price?min=cheap&max=100' });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'Invalid price range', code: 'BAD_REQUEST' });
      });

      it('requires both bounds', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/flights/price?min=100' });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'min and max are required', code: 'VALIDATION' });
      });

      it('clears the cache', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/flights/clear' });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ status: 'success', message: 'All flights have been cleared' });

        const list = await app.inject({ method: 'GET', url: '/api/flights' });
        expect(list.json()).toEqual({ status: 'success', flights: [] });
      });
    });
  });

  describe('errors', () => {
    it('answers unknown routes with 404', async () => {
      const res = await app.inject({ method: 'GET', url: '/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Route GET /nope not found', code: 'NOT_FOUND' });
    });

    it('answers malformed JSON with 400', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/login',
        headers: { 'content-type': 'application/json' },
        payload: '{"username":',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'BAD_REQUEST' });
    });
  });
});
