import { varint } from 'multiformats';
import { CID } from 'multiformats/cid';
import { base36 } from 'multiformats/bases/base36';

/** Multicodec prefix shared by every stream id. */
const STREAM_ID_CODEC = 0xce;

export const StreamType = {
  tile: 0,
  caip10_link: 1,
  model: 2,
  model_instance_document: 3,
  unloadable: 4,
} as const;

export type StreamTypeName = keyof typeof StreamType;
export type StreamTypeCode = (typeof StreamType)[StreamTypeName];

const KNOWN_TYPES: ReadonlySet<number> = new Set(Object.values(StreamType));

export const DEFAULT_STREAM_TYPE: StreamTypeCode = StreamType.model_instance_document;

export function isStreamType(value: number): value is StreamTypeCode {
  return KNOWN_TYPES.has(value);
}

/**
 * Stable identifier of a logical stream.
 *
 * Encoded as base36 multibase over `varint(0xce) ‖ varint(type) ‖ genesis cid`,
 * so it never collides with the cid of any event.
 */
export class StreamId {
  private constructor(
    readonly type: StreamTypeCode,
    readonly genesis: CID,
  ) {}

  static fromGenesis(type: StreamTypeCode, genesis: string | CID): StreamId {
    const cid = typeof genesis === 'string' ? CID.parse(genesis) : genesis;
    return new StreamId(type, cid);
  }

  /** Parses the textual form. Throws on a bad prefix, unknown type or trailing bytes. */
  static parse(text: string): StreamId {
    const bytes = base36.decode(text);

    const [codec, codecLength] = varint.decode(bytes);
    if (codec !== STREAM_ID_CODEC) {
      throw new Error(`not a stream id: unexpected codec 0x${codec.toString(16)}`);
    }

    const [type, typeLength] = varint.decode(bytes, codecLength);
    if (!isStreamType(type)) {
      throw new Error(`not a stream id: unknown stream type ${type}`);
    }

    const [cid, rest] = CID.decodeFirst(bytes.subarray(codecLength + typeLength));
    if (rest.length > 0) {
      throw new Error('not a stream id: trailing bytes after genesis cid');
    }

    return new StreamId(type, cid);
  }

  get bytes(): Uint8Array {
    const cidBytes = this.genesis.bytes;
    const codecLength = varint.encodingLength(STREAM_ID_CODEC);
    const typeLength = varint.encodingLength(this.type);
    const out = new Uint8Array(codecLength + typeLength + cidBytes.length);

    varint.encodeTo(STREAM_ID_CODEC, out, 0);
    varint.encodeTo(this.type, out, codecLength);
    out.set(cidBytes, codecLength + typeLength);
    return out;
  }

  toString(): string {
    return base36.encode(this.bytes);
  }
}
