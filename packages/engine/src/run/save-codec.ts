// ─── Save Codec ────────────────────────────────────────────────────
// Byte and value forms of a run's joker blob. Bytes are gzipped JSON.
// Decoding validates the envelope as a whole and every entry on its own;
// an entry that fails becomes a lost entry and the rest still load.
//
//   version 1  { id, version, state }           slots follow entry order
//   version 2  { id, slot, version, sellBonus, state }

import pako from "pako";
import {
  CURRENT_SAVE_VERSION,
  LegacySavedJokerEntrySchema,
  SAVE_FORMAT,
  SaveEnvelopeSchema,
  SavedJokerEntrySchema,
  formatZodIssues,
  type JokerSaveBlob,
  type SavedJokerEntry,
} from "@jester/schema";
import { SaveBlobError, UnsupportedVersionError } from "../errors";

/** An entry that could not be restored. */
export interface LostEntry {
  readonly index: number;
  /** The saved identifier, when the entry had a readable one. */
  readonly id: string | undefined;
  readonly reason: string;
}

/** A readable entry and its position in the saved list. */
export interface DecodedEntry {
  readonly index: number;
  readonly entry: SavedJokerEntry;
}

export interface DecodedSave {
  /** Blob version as written, before migration. */
  readonly version: number;
  readonly nextSlot: number;
  readonly entries: readonly DecodedEntry[];
  readonly lost: readonly LostEntry[];
}

// ─── Encoding ──────────────────────────────────────────────────────

export function encodeSave(blob: JokerSaveBlob): Uint8Array {
  return pako.gzip(JSON.stringify(blob));
}

/**
 * Reads a blob in either form.
 *
 * @throws {SaveBlobError} when the bytes or the envelope are unreadable.
 * @throws {UnsupportedVersionError} for a blob newer than this build.
 */
export function decodeSave(input: unknown): DecodedSave {
  const value = input instanceof Uint8Array ? unzip(input) : input;

  const envelope = SaveEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new SaveBlobError(`Invalid save envelope: ${formatZodIssues(envelope.error.issues)}`);
  }
  const { version, entries } = envelope.data;
  if (version > CURRENT_SAVE_VERSION) {
    throw new UnsupportedVersionError(version, CURRENT_SAVE_VERSION, "save blob");
  }

  const decoded: DecodedEntry[] = [];
  const lost: LostEntry[] = [];
  const slots = new Set<number>();

  entries.forEach((raw, index) => {
    const entry = version === 1 ? migrateLegacyEntry(raw, index) : parseEntry(raw);
    if (!entry.ok) {
      lost.push({ index, id: rawId(raw), reason: entry.reason });
      return;
    }
    if (slots.has(entry.entry.slot)) {
      lost.push({ index, id: entry.entry.id, reason: `Slot ${entry.entry.slot} appears twice` });
      return;
    }
    slots.add(entry.entry.slot);
    decoded.push({ index, entry: entry.entry });
  });

  const highest = decoded.reduce((max, e) => Math.max(max, e.entry.slot + 1), 0);
  return {
    version,
    nextSlot: Math.max(envelope.data.nextSlot ?? 0, highest),
    entries: decoded,
    lost,
  };
}

/** A blob in the current layout. */
export function createSaveBlob(nextSlot: number, entries: readonly SavedJokerEntry[]): JokerSaveBlob {
  return { format: SAVE_FORMAT, version: CURRENT_SAVE_VERSION, nextSlot, entries };
}

// ─── Helpers ───────────────────────────────────────────────────────

type EntryResult =
  | { readonly ok: true; readonly entry: SavedJokerEntry }
  | { readonly ok: false; readonly reason: string };

function unzip(bytes: Uint8Array): unknown {
  let json: string;
  try {
    json = pako.ungzip(bytes, { to: "string" });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SaveBlobError(`Save bytes are not gzip: ${message}`);
  }
  try {
    return JSON.parse(json);
  } catch {
    throw new SaveBlobError("Save bytes do not hold JSON");
  }
}

function parseEntry(raw: unknown): EntryResult {
  const result = SavedJokerEntrySchema.safeParse(raw);
  if (!result.success) return { ok: false, reason: formatZodIssues(result.error.issues) };
  return { ok: true, entry: result.data };
}

function migrateLegacyEntry(raw: unknown, index: number): EntryResult {
  const result = LegacySavedJokerEntrySchema.safeParse(raw);
  if (!result.success) return { ok: false, reason: formatZodIssues(result.error.issues) };
  const { id, version, state } = result.data;
  return { ok: true, entry: { id, slot: index, version, sellBonus: 0, state } };
}

function rawId(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return undefined;
}
