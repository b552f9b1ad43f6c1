/**
 * @amoca/event-store: Event Catalog.
 *
 * Formalizes all domain events into a unified catalog with:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per event type
 * - Runtime payload validation before anything is committed
 *
 * Unknown event types are reported, never silently accepted.
 */

import type { EventSource } from "@amoca/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "staking.stake.created") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /**
   * Validate a payload against the current schema version.
   */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of all domain event types.
 *
 * The catalog serves as:
 * 1. Documentation: what events exist in the system
 * 2. Validation: runtime payload checking
 * 3. Discovery: listing all known event types
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same version is a
   * no-op; a different version replaces the schema.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * List all registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  /**
   * Get all event schemas for a specific source subsystem.
   */
  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  /**
   * Like validate(), but throws CatalogError naming what was wrong.
   */
  assertValid(eventType: string, source: EventSource, payload: unknown): void {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    if (schema.source !== source) {
      throw new CatalogError(
        `Event "${eventType}" belongs to "${schema.source}", emitted by "${source}"`,
      );
    }
    if (!schema.validate(payload)) {
      throw new CatalogError(`Invalid payload for event "${eventType}"`);
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
