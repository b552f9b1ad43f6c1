/**
 * @amoca/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore with multi-stream commits
 * - EventCatalog for payload validation
 * - Token core domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  CommitRecord,
  CommitResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  DeliveryFailure,
  DeliveryErrorHandler,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Domain events
export { AMOCA_EVENTS, ALL_SCHEMAS, createAmocaCatalog } from "./amoca-events.js";
export type {
  AmocaEventType,
  TokensMintedPayload,
  TokensBurnedPayload,
  PoolCreatedPayload,
  StakeCreatedPayload,
  RewardClaimedPayload,
  ProposalCreatedPayload,
  VoteCastPayload,
  AccessRightCreatedPayload,
} from "./amoca-events.js";
