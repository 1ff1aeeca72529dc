// ─── State Cell ────────────────────────────────────────────────────
// Holds one behavior instance's persistent data behind a zod schema and
// a version number. Deserialization validates into a fresh value and
// swaps it in only on success, so a rejected payload never touches the
// current state.

import type { z } from "zod";
import type { JsonValue } from "@jester/schema";
import { formatZodIssues } from "@jester/schema";
import { StateDeserializeError, UnsupportedVersionError } from "../errors";

export interface StateCellOptions<T extends JsonValue> {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly version: number;
  readonly initial: T;
  /** Upgrades a payload written at an older version to the current shape. */
  readonly migrate?: (raw: JsonValue, from: number) => JsonValue;
}

export class StateCell<T extends JsonValue> {
  private value: T;

  constructor(private readonly options: StateCellOptions<T>) {
    this.value = structuredClone(options.initial);
  }

  get version(): number {
    return this.options.version;
  }

  get(): T {
    return this.value;
  }

  set(next: T): void {
    this.value = next;
  }

  update(fn: (previous: T) => T): void {
    this.value = fn(this.value);
  }

  reset(): void {
    this.value = structuredClone(this.options.initial);
  }

  serialize(): JsonValue {
    return structuredClone(this.value);
  }

  /**
   * @throws {UnsupportedVersionError} when `version` is newer than this cell's.
   * @throws {StateDeserializeError} when the payload fails validation or migration.
   */
  deserialize(raw: JsonValue, version: number): void {
    if (!Number.isInteger(version) || version < 0) {
      throw new StateDeserializeError(`Invalid state version: ${version}`);
    }
    if (version > this.options.version) {
      throw new UnsupportedVersionError(version, this.options.version);
    }

    let upgraded = raw;
    if (version < this.options.version && this.options.migrate) {
      try {
        upgraded = this.options.migrate(raw, version);
      } catch (err) {
        throw new StateDeserializeError(
          `Migration from version ${version} failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }

    const result = this.options.schema.safeParse(upgraded);
    if (!result.success) {
      throw new StateDeserializeError(formatZodIssues(result.error.issues));
    }
    this.value = result.data;
  }
}
