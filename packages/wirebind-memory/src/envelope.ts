// Development codec: a fixed message header followed by a JSON body.
//
// Header layout (16 bytes, little-endian):
//   0..4   txid (u32)
//   4..7   flags (reserved, zero)
//   7      magic number 0x01
//   8..16  ordinal (u64)
//
// Bodies are UTF-8 JSON. bigint values travel as `{ "$bigint": "<digits>" }`
// and an empty body decodes to null.

import type { DecodedMessage, EncodeRequest, WireCodec, WireMessage } from "@wirebind/core";

export const HEADER_SIZE = 16;
export const MAGIC = 0x01;

const BIGINT_KEY = "$bigint";

/** WireCodec for in-process channels and tests. Not a wire-compatible format. */
export class EnvelopeCodec implements WireCodec {
  encodeMessage(request: EncodeRequest): WireMessage {
    const body = encodeBody(request.object);
    const bytes = new Uint8Array(HEADER_SIZE + body.length);
    const view = new DataView(bytes.buffer);
    view.setUint32(0, request.txid, true);
    bytes[7] = MAGIC;
    view.setBigUint64(8, BigInt.asUintN(64, request.ordinal), true);
    bytes.set(body, HEADER_SIZE);
    return { bytes, handles: [] };
  }

  decodeMessage(message: WireMessage): DecodedMessage {
    const { bytes } = message;
    if (bytes.length < HEADER_SIZE) throw new Error(`envelope: short header (${bytes.length} bytes)`);
    if (bytes[7] !== MAGIC) throw new Error(`envelope: bad magic number ${bytes[7]}`);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return {
      txid: view.getUint32(0, true),
      ordinal: view.getBigUint64(8, true),
      body: decodeBody(bytes.subarray(HEADER_SIZE)),
    };
  }

  encodeObject(object: unknown): WireMessage {
    return { bytes: encodeBody(object), handles: [] };
  }
}

export function encodeBody(object: unknown): Uint8Array {
  if (object === null || object === undefined) return new Uint8Array(0);
  return new TextEncoder().encode(JSON.stringify(object, replaceBigint));
}

export function decodeBody(bytes: Uint8Array): unknown {
  if (bytes.length === 0) return null;
  const text = new TextDecoder().decode(bytes);
  try {
    return JSON.parse(text, reviveBigint);
  } catch (e) {
    throw new Error(`envelope: invalid body: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function replaceBigint(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? { [BIGINT_KEY]: value.toString() } : value;
}

function reviveBigint(_key: string, value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const keys = Object.keys(value);
  if (keys.length !== 1 || keys[0] !== BIGINT_KEY) return value;
  const digits: unknown = Reflect.get(value, BIGINT_KEY);
  return typeof digits === "string" ? BigInt(digits) : value;
}
