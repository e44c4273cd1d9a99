/**
 * Socket transport barrel export
 */

export { SocketBroker, SocketClient } from "./socket-transport.js";
export type { ISocketTransportOptions } from "./socket-transport.js";
export { MAX_FRAME_BYTES, FrameDecoder, encodeFrame, decodeLine, signPayload } from "./frame-codec.js";
export type { IDecodeResult } from "./frame-codec.js";
