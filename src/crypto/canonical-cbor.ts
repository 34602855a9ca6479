/**
 * Canonical CBOR (RFC 8949 section 4.2.1 core deterministic encoding)
 *
 * Used to hash notifications and to build signed request messages, so the
 * same logical value always yields the same bytes: shortest-form integer
 * heads, map keys sorted by encoded length then bytewise, no floats.
 */

const MAJOR_UINT = 0;
const MAJOR_NEGINT = 1;
const MAJOR_BYTES = 2;
const MAJOR_TEXT = 3;
const MAJOR_ARRAY = 4;
const MAJOR_MAP = 5;

const SIMPLE_FALSE = 0xf4;
const SIMPLE_TRUE = 0xf5;
const SIMPLE_NULL = 0xf6;
const SIMPLE_UNDEFINED = 0xf7;

const MIN_INT64 = -(2n ** 63n);
const MAX_UINT64 = 2n ** 64n - 1n;

function head(major: number, arg: bigint): Buffer {
  if (arg < 0n || arg > MAX_UINT64) {
    throw new Error(`CBOR argument out of range: ${arg}`);
  }
  const initial = major << 5;

  if (arg < 24n) return Buffer.from([initial | Number(arg)]);

  if (arg <= 0xffn) return Buffer.from([initial | 24, Number(arg)]);

  if (arg <= 0xffffn) {
    const out = Buffer.alloc(3);
    out[0] = initial | 25;
    out.writeUInt16BE(Number(arg), 1);
    return out;
  }

  if (arg <= 0xffffffffn) {
    const out = Buffer.alloc(5);
    out[0] = initial | 26;
    out.writeUInt32BE(Number(arg), 1);
    return out;
  }

  const out = Buffer.alloc(9);
  out[0] = initial | 27;
  out.writeBigUInt64BE(arg, 1);
  return out;
}

function encodeInteger(value: bigint): Buffer {
  if (value >= 0n) return head(MAJOR_UINT, value);
  if (value < MIN_INT64) throw new Error('Integer below int64 range');
  return head(MAJOR_NEGINT, -1n - value);
}

function encodeString(text: string): Buffer {
  const bytes = Buffer.from(text, 'utf8');
  return Buffer.concat([head(MAJOR_TEXT, BigInt(bytes.length)), bytes]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encodeRecord(value: Record<string, unknown>): Buffer {
  const pairs = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .map((key) => ({ key: encodeString(key), val: canonicalCborEncode(value[key]) }));

  pairs.sort((a, b) => a.key.length - b.key.length || Buffer.compare(a.key, b.key));

  const chunks: Buffer[] = [head(MAJOR_MAP, BigInt(pairs.length))];
  for (const pair of pairs) {
    chunks.push(pair.key, pair.val);
  }
  return Buffer.concat(chunks);
}

/**
 * Encode a JSON-like value (plus bigint and byte arrays). Object properties
 * holding `undefined` are omitted so optional fields hash the same whether
 * absent or explicitly undefined.
 */
export function canonicalCborEncode(value: unknown): Buffer {
  switch (typeof value) {
    case 'undefined':
      return Buffer.from([SIMPLE_UNDEFINED]);
    case 'boolean':
      return Buffer.from([value ? SIMPLE_TRUE : SIMPLE_FALSE]);
    case 'bigint':
      return encodeInteger(value);
    case 'number':
      if (!Number.isSafeInteger(value)) {
        throw new Error(`Canonical CBOR accepts safe integers only, got ${value}`);
      }
      return encodeInteger(BigInt(value));
    case 'string':
      return encodeString(value);
    default:
      break;
  }

  if (value === null) return Buffer.from([SIMPLE_NULL]);

  if (value instanceof Uint8Array) {
    return Buffer.concat([head(MAJOR_BYTES, BigInt(value.length)), Buffer.from(value)]);
  }

  if (Array.isArray(value)) {
    return Buffer.concat([head(MAJOR_ARRAY, BigInt(value.length)), ...value.map(canonicalCborEncode)]);
  }

  if (isRecord(value)) return encodeRecord(value);

  throw new Error(`Unsupported CBOR type: ${typeof value}`);
}
