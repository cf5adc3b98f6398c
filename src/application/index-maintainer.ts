import type { IndexFolder, JsonValue } from '../domain/index.js';
import type { StoreTransaction } from './stream-store.js';

function isObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Decodes a base64/base64url JSON document; undefined when it is not one. */
function decodeOptions(encoded: string): JsonValue | undefined {
  const text = Buffer.from(encoded, 'base64').toString('utf-8');
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    // options is free-form; a non-JSON value simply carries no signal
    return undefined;
  }
}

/**
 * Derives the searchable signal of a stream from its content.
 *
 * Index folders keep their signal inside the base64-encoded `options`
 * document; a top-level `signal` field is used otherwise.
 */
export function deriveSignal(content: JsonValue): JsonValue | null {
  if (!isObject(content)) return null;

  const options = content['options'];
  if (typeof options === 'string' && options.length > 0) {
    const decoded = decodeOptions(options);
    if (isObject(decoded)) {
      const signal = decoded['signal'];
      if (signal !== undefined && signal !== null) return signal;
    }
  }

  const signal = content['signal'];
  return signal === undefined ? null : signal;
}

/**
 * Writes the index folder for a new tip. Must run in the same
 * transaction as the tip update.
 */
export async function maintainIndex(
  tx: StoreTransaction,
  streamId: string,
  tip: string,
  content: JsonValue,
): Promise<IndexFolder> {
  const folder: IndexFolder = {
    stream_id: streamId,
    tip,
    signal: deriveSignal(content),
  };
  await tx.upsertIndexFolder(folder);
  return folder;
}

/**
 * JSON containment, matching Postgres `jsonb @>`: objects contain a subset
 * of keys recursively, arrays contain every element of the predicate
 * (in any order), scalars must be equal. As in Postgres, a top-level array
 * also contains a scalar it holds as an element.
 */
export function jsonContains(value: JsonValue, predicate: JsonValue): boolean {
  if (Array.isArray(value) && isScalar(predicate)) {
    return value.some((item) => item === predicate);
  }
  return contains(value, predicate);
}

function isScalar(value: JsonValue): boolean {
  return value === null || typeof value !== 'object';
}

function contains(value: JsonValue, predicate: JsonValue): boolean {
  if (Array.isArray(predicate)) {
    if (!Array.isArray(value)) return false;
    return predicate.every((wanted) => value.some((item) => contains(item, wanted)));
  }

  if (isObject(predicate)) {
    if (!isObject(value)) return false;
    return Object.entries(predicate).every(([key, wanted]) => {
      const actual = value[key];
      return actual !== undefined && contains(actual, wanted);
    });
  }

  return value === predicate;
}
