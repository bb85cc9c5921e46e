/**
 * Type barrel: re-exports all public types from @strongroom/node.
 */

// DTOs
export {
  AddressSchema,
  AssetNameSchema,
  AmountSchema,
  PaginationQuerySchema,
  OperationSchema,
  FaucetSchema,
  SetOracleSchema,
  SetCeilingSchema,
  ListEventsQuerySchema,
  assetName,
  toBalanceDto,
  toTotalsDto,
  toParametersDto,
  toHoldingsDto,
  toEventDto,
} from "./dto.js";
export type {
  AssetName,
  OperationDto,
  SetOracleDto,
  SetCeilingDto,
  ListEventsQuery,
  BalanceDto,
  TotalsDto,
  ParametersDto,
  HoldingsDto,
  EventDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
