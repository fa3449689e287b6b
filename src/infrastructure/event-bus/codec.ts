import { errorMessage } from "../../shared/errors.js";
import { isPlainObject } from "../../shared/records.js";
import type { StreamEntry } from "./types.js";

export type StreamFields = Record<string, string>;

// Must stay a type alias to remain assignable to StreamFields.
export type EncodedEntryFields = {
  payload: string;
  published_at_utc: string;
};

export type DecodedEntry =
  | { ok: true; entry: StreamEntry }
  | { ok: false; error: string; fields: StreamFields };

export function encodeEntryFields(
  message: unknown,
  publishedAt: Date = new Date()
): EncodedEntryFields {
  return {
    payload: JSON.stringify(message),
    published_at_utc: publishedAt.toISOString()
  };
}

/** Keeps string-valued fields only; anything else was not written by this codec. */
function stringFields(raw: unknown): StreamFields {
  const fields: StreamFields = {};
  if (isPlainObject(raw)) {
    for (const [name, value] of Object.entries(raw)) {
      if (typeof value === "string") {
        fields[name] = value;
      }
    }
  }
  return fields;
}

export function decodeEntryFields(stream: string, id: string, raw: unknown): DecodedEntry {
  const fields = stringFields(raw);
  const { payload, published_at_utc: publishedAt } = fields;
  if (!payload) {
    return { ok: false, error: 'Missing "payload" field', fields };
  }
  if (!publishedAt) {
    return { ok: false, error: 'Missing "published_at_utc" field', fields };
  }

  try {
    const message: unknown = JSON.parse(payload);
    return { ok: true, entry: { id, stream, message, published_at_utc: publishedAt } };
  } catch (error) {
    return { ok: false, error: `Invalid JSON payload: ${errorMessage(error)}`, fields };
  }
}
