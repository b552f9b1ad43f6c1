/**
 * Authentication types.
 *
 * Every caller is identified by the address it acts as:
 * 1. API key via X-Api-Key header, bound to an address in config
 * 2. X-Caller header, accepted only when no keys are configured
 */

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller identity, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";

  /** Address transitions run as */
  readonly address: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: string;
}
