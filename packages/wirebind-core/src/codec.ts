/**
 * Wire codec boundary.
 *
 * The byte layout of messages belongs to the codec; dispatch only sees
 * decoded headers and plain payload values.
 */

/** Encoded message bytes plus the handles that travel with them. */
export interface WireMessage {
  bytes: Uint8Array;
  handles: readonly number[];
}

/** Header and payload of a decoded message. */
export interface DecodedMessage {
  txid: number;
  ordinal: bigint;
  /** Plain payload (records, arrays, primitives); null for empty messages. */
  body: unknown;
}

export interface EncodeRequest {
  ordinal: bigint;
  txid: number;
  /** Library the message belongs to. */
  library: string;
  /** Raw identifier of the payload type, or null for an empty payload. */
  typeName: string | null;
  object: unknown;
}

export interface WireCodec {
  decodeMessage(message: WireMessage): DecodedMessage;
  encodeMessage(request: EncodeRequest): WireMessage;
  /** Encode a standalone value of a declared type. */
  encodeObject(object: unknown, library: string, typeName: string): WireMessage;
}
