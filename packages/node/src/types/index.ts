/**
 * Type barrel — re-exports all public types from @ft-ledger/node.
 */

// DTOs
export {
  AccountIdSchema,
  U128StringSchema,
  PaginationQuerySchema,
  CallerHeadersSchema,
  FtTransferSchema,
  FtTransferCallSchema,
  StorageDepositSchema,
  StorageWithdrawSchema,
  StorageUnregisterSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  ACCOUNT_ID_HEADER,
  ATTACHED_DEPOSIT_HEADER,
  toPayoutDto,
} from "./dto.js";
export type {
  FtTransferDto,
  FtTransferCallDto,
  StorageDepositDto,
  StorageWithdrawDto,
  StorageUnregisterDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  PayoutDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  DecodedCursor,
} from "./pagination.js";

// App env
export type { AppEnv, CallerEnv } from "./api-contract.js";
