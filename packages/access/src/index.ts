/**
 * @amoca/access: Leveled, expiring data-access rights.
 */

export { AccessRightsEngine, ACCESS_EVENTS, verifyAccess } from "./access-engine.js";

export type { DataAccessRight, AccessOptions, AccessErrorCode } from "./types.js";
export { AccessError } from "./types.js";
