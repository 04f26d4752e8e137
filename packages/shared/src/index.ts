export { createLogger, redactMeta, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  AmadeusConfigSchema,
  ApiConfigSchema,
} from './config';
export { Argon2PasswordHasher, SALT_LENGTH } from './auth/password-hasher';
export { AmadeusFlightProvider, type AmadeusProviderConfig } from './amadeus/amadeus-provider';
export { AmadeusOfferSchema, mapOffer, mapOffers, type AmadeusOffer } from './amadeus/offer-mapper';
