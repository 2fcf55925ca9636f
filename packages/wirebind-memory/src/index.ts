// @wirebind/memory - in-process transport and development codec

export { MemoryChannel, channelPair } from "./channel.ts";
export { EnvelopeCodec, HEADER_SIZE, MAGIC, encodeBody, decodeBody } from "./envelope.ts";
