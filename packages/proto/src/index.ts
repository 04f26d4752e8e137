export {
  UsernameSchema,
  PasswordSchema,
  CreateAccountRequestSchema,
  LoginRequestSchema,
  UpdatePasswordRequestSchema,
  MessageResponseSchema,
  type CreateAccountRequest,
  type LoginRequest,
  type UpdatePasswordRequest,
  type MessageResponse,
} from './api/auth';
export {
  AirportCodeSchema,
  TravelDateSchema,
  FlightSearchRequestSchema,
  AirlineQuerySchema,
  OriginQuerySchema,
  PriceRangeQuerySchema,
  FlightRecordSchema,
  FlightListResponseSchema,
  type FlightSearchRequest,
  type AirlineQuery,
  type OriginQuery,
  type PriceRangeQuery,
  type FlightListResponse,
} from './api/flight';
