// ─── Engine Errors ─────────────────────────────────────────────────
// Every error the engine throws or reports carries a machine-readable
// `code` so the save/load and shop collaborators can branch on it.

/** Base class for all engine errors. */
export class JesterError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = "JesterError";
  }
}

export type ConstructionErrorCode =
  | "unknown_identifier"
  | "invalid_arguments"
  | "invalid_definition";

/** Thrown when a behavior cannot be built from an identifier and arguments. */
export class ConstructionError extends JesterError {
  constructor(
    message: string,
    readonly reason: ConstructionErrorCode,
    readonly identifier: string
  ) {
    super(message, reason);
    this.name = "ConstructionError";
  }
}

/**
 * Thrown by `deserializeState` when a payload is malformed. The
 * instance keeps whatever state it had before the call.
 */
export class StateDeserializeError extends JesterError {
  constructor(message: string) {
    super(message, "state_deserialize");
    this.name = "StateDeserializeError";
  }
}

/** A version tag newer than this build understands. */
export class UnsupportedVersionError extends JesterError {
  constructor(
    readonly found: number,
    readonly supported: number,
    what = "state"
  ) {
    super(
      `Unsupported ${what} version ${found} (this build reads up to ${supported})`,
      "unsupported_version"
    );
    this.name = "UnsupportedVersionError";
  }
}

/** Wraps whatever a behavior hook threw. */
export class HookInvocationError extends JesterError {
  constructor(
    readonly hook: string,
    readonly identifier: string,
    readonly failure: unknown
  ) {
    super(
      `${identifier}.${hook} failed: ${failure instanceof Error ? failure.message : String(failure)}`,
      "hook_failed"
    );
    this.name = "HookInvocationError";
  }
}

/** A non-finite value reached an effect field. */
export class NumericBoundError extends JesterError {
  constructor(
    readonly field: string,
    readonly value: number
  ) {
    super(`Effect field '${field}' produced ${value}`, "numeric_bound");
    this.name = "NumericBoundError";
  }
}

/** The save blob as a whole could not be read. */
export class SaveBlobError extends JesterError {
  constructor(message: string) {
    super(message, "save_blob");
    this.name = "SaveBlobError";
  }
}

/** The joker catalog or the registry built from it is inconsistent. */
export class CatalogError extends JesterError {
  constructor(message: string) {
    super(message, "invalid_catalog");
    this.name = "CatalogError";
  }
}

export type AcquisitionErrorCode = "no_free_slot" | "duplicate" | "unknown_instance";

/** The run refused to add or address a joker instance. */
export class AcquisitionError extends JesterError {
  constructor(
    message: string,
    readonly reason: AcquisitionErrorCode,
    readonly identifier: string
  ) {
    super(message, reason);
    this.name = "AcquisitionError";
  }
}
