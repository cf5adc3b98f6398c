import { z } from 'zod';
import * as json from 'multiformats/codecs/json';
import type { Operation } from 'fast-json-patch';
import type { Event, JsonObject, JsonValue } from '../domain/index.js';
import { MalformedEventError } from '../domain/index.js';

/**
 * Payload envelopes carried in `blocks[0]` of every event, encoded with the
 * multiformats json codec. Any further blocks (linked blocks, capability
 * blocks) are carried verbatim and never interpreted here.
 */

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const headerSchema = z.record(z.string(), jsonValueSchema);

const pointer = z.string().refine(
  (path) => path === '' || path.startsWith('/'),
  { message: 'JSON pointer must be empty or start with "/"' },
);

/** RFC 6902 operations, shaped to match fast-json-patch's `Operation`. */
export const patchOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('add'), path: pointer, value: jsonValueSchema }),
  z.object({ op: z.literal('remove'), path: pointer }),
  z.object({ op: z.literal('replace'), path: pointer, value: jsonValueSchema }),
  z.object({ op: z.literal('move'), from: pointer, path: pointer }),
  z.object({ op: z.literal('copy'), from: pointer, path: pointer }),
  z.object({ op: z.literal('test'), path: pointer, value: jsonValueSchema }),
]);

const genesisEnvelopeSchema = z.object({
  header: headerSchema,
  data: jsonValueSchema.optional(),
});

const signedEnvelopeSchema = z.object({
  header: headerSchema.optional(),
  data: z.array(patchOperationSchema),
}).strict();

const anchorEnvelopeSchema = z.object({
  proof: z.string().min(1),
  path: z.string().optional(),
}).strict();

export type GenesisEnvelope = {
  readonly kind: 'genesis';
  readonly header: JsonObject;
  readonly data: JsonValue | undefined;
};

export type SignedEnvelope = {
  readonly kind: 'signed';
  readonly header: JsonObject | undefined;
  readonly patch: readonly Operation[];
};

export type AnchorEnvelope = {
  readonly kind: 'anchor';
  readonly proof: string;
  readonly path: string | undefined;
};

export type Envelope = GenesisEnvelope | SignedEnvelope | AnchorEnvelope;

function decodeJson(block: Uint8Array): unknown {
  try {
    return json.decode(block);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedEventError('blocks[0]', `is not a JSON document (${reason})`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Decodes and shape-checks the payload envelope of an event.
 *
 * A genesis event must carry a genesis envelope; any other event carries
 * either a signed patch or an anchor.
 */
export function decodeEnvelope(event: Event): Envelope {
  const block = event.blocks[0];
  if (block === undefined) {
    throw new MalformedEventError('blocks', 'must not be empty');
  }

  const raw = decodeJson(block);

  if (event.prev === null) {
    const parsed = genesisEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedEventError('blocks[0]', `is not a genesis envelope (${describeIssues(parsed.error)})`);
    }
    return { kind: 'genesis', header: parsed.data.header, data: parsed.data.data };
  }

  const signed = signedEnvelopeSchema.safeParse(raw);
  if (signed.success) {
    return { kind: 'signed', header: signed.data.header, patch: signed.data.data };
  }

  const anchor = anchorEnvelopeSchema.safeParse(raw);
  if (anchor.success) {
    return { kind: 'anchor', proof: anchor.data.proof, path: anchor.data.path };
  }

  throw new MalformedEventError(
    'blocks[0]',
    `is neither a signed nor an anchor envelope (${describeIssues(signed.error)})`,
  );
}

/** Encodes an envelope body as a payload block. */
export function encodePayload(body: JsonValue): Uint8Array {
  return json.encode(body);
}
