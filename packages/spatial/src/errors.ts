/**
 * Errors raised by the spatial index.
 *
 * All of them signal a caller bookkeeping defect or a broken internal
 * invariant. Empty query results are never reported through errors.
 */

import { Logger } from "./utils/Logger.js";

export type SpatialIndexErrorCode =
  | "doubleInsert"
  | "notPresent"
  | "hullMismatch"
  | "malformedHull"
  | "outOfBounds"
  | "invalidConfig"
  | "corruptedIndex";

export class SpatialIndexError extends Error {
  constructor(
    public readonly code: SpatialIndexErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SpatialIndexError";
  }
}

/** Logs the failure under `system` and throws it. */
export function fail(
  system: string,
  code: SpatialIndexErrorCode,
  message: string,
): never {
  const error = new SpatialIndexError(code, message);
  Logger.systemError(system, message, error);
  throw error;
}

/** Throws a `corruptedIndex` error unless `condition` holds. */
export function invariant(
  condition: boolean,
  system: string,
  message: string,
): asserts condition {
  if (!condition) {
    fail(system, "corruptedIndex", message);
  }
}
