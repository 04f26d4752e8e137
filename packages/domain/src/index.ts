export type { User, UserSummary } from './user';
export type { UserRepository, PasswordHasher } from './ports';
export { AuthService, AuthError, type AuthErrorKind, type AuthServiceDeps } from './auth-service';
export {
  isSameFlight,
  parsePrice,
  formatPrice,
  type FlightRecord,
  type FlightSearchQuery,
  type ParsedPrice,
} from './flight';
export { ProviderError, ProviderAuthError, type FlightProvider } from './flight-ports';
export { FlightCache, FlightError } from './flight-cache';
export { FlightService, type FlightServiceDeps } from './flight-service';
