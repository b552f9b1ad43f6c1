/**
 * Type barrel: re-exports all public types from @amoca/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  PaginationQuerySchema,
  MintSchema,
  TransferSchema,
  SplitSchema,
  MergeSchema,
  StakeSchema,
  CreateProposalSchema,
  VoteSchema,
  GrantAccessSchema,
  VerifyAccessSchema,
  EventQuerySchema,
  StreamEventQuerySchema,
} from "./dto.js";
export type {
  MintDto,
  TransferDto,
  SplitDto,
  MergeDto,
  StakeDto,
  CreateProposalDto,
  VoteDto,
  GrantAccessDto,
  VerifyAccessDto,
  EventQueryDto,
  StreamEventQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, HttpError } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, sequenceOf } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export {
  amountView,
  coinView,
  supplyView,
  poolView,
  stakeView,
  claimView,
  proposalView,
  rightView,
} from "./views.js";
export type { AmountView } from "./views.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
