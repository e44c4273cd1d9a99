/**
 * Wire format for bus frames: one JSON object per line,
 * `{"payload":"<frame as JSON>","hmac":"<hex sha256 of payload>"}`.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { TransportError } from "../types/errors.js";
import { isTopic } from "../types/message.js";
import type { Topic } from "../types/message.js";
import type { BusFrame } from "../teams/message-bus.js";

// ── Constants ───────────────────────────────────────────────────────────

const NEWLINE = 0x0a;
export const MAX_FRAME_BYTES = 1_048_576;

// ── Zod Schemas ─────────────────────────────────────────────────────────

const LineSchema = z.object({ payload: z.string(), hmac: z.string().regex(/^[0-9a-f]{64}$/) });

const FrameSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("publish"),
    topic: z.custom<Topic>((value) => typeof value === "string" && isTopic(value), "unknown topic"),
    message: z.unknown(),
  }),
  z.object({ kind: z.literal("enqueue"), agentId: z.string().min(1), envelope: z.unknown() }),
  z.object({ kind: z.literal("claim"), agentId: z.string().min(1) }),
]);

// ── Encoding ────────────────────────────────────────────────────────────

export function signPayload(payload: string, secret: string): string {
  return createHmac("sha256", secret).update(payload).digest("hex");
}

export function encodeFrame(frame: BusFrame, secret: string): string {
  const payload = JSON.stringify(frame);
  return `${JSON.stringify({ payload, hmac: signPayload(payload, secret) })}\n`;
}

/** Verify and parse one line. Throws TransportError. */
export function decodeLine(line: string, secret: string): BusFrame {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new TransportError("frame is not valid JSON");
  }

  const envelope = LineSchema.safeParse(raw);
  if (!envelope.success) {
    throw new TransportError("frame envelope is malformed");
  }

  const expected = Buffer.from(signPayload(envelope.data.payload, secret), "hex");
  const received = Buffer.from(envelope.data.hmac, "hex");
  if (!timingSafeEqual(expected, received)) {
    throw new TransportError("frame authentication failed");
  }

  let body: unknown;
  try {
    body = JSON.parse(envelope.data.payload);
  } catch {
    throw new TransportError("frame payload is not valid JSON");
  }

  const parsed = FrameSchema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(`frame is malformed: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }

  const frame = parsed.data;
  switch (frame.kind) {
    case "publish":
      return { kind: "publish", topic: frame.topic, message: frame.message };
    case "enqueue":
      return { kind: "enqueue", agentId: frame.agentId, envelope: frame.envelope };
    case "claim":
      return { kind: "claim", agentId: frame.agentId };
  }
}

// ── Stream Decoding ─────────────────────────────────────────────────────

export interface IDecodeResult {
  readonly frames: BusFrame[];
  /** One entry per rejected line. */
  readonly errors: string[];
}

/**
 * Splits a byte stream into lines and decodes each. A partial line is held
 * until its newline arrives; one longer than MAX_FRAME_BYTES is an error.
 */
export class FrameDecoder {
  private readonly secret: string;
  private buffer = Buffer.alloc(0);

  constructor(secret: string) {
    this.secret = secret;
  }

  push(chunk: Buffer): IDecodeResult {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const frames: BusFrame[] = [];
    const errors: string[] = [];

    let index = this.buffer.indexOf(NEWLINE);
    while (index !== -1) {
      const line = this.buffer.subarray(0, index).toString("utf-8");
      this.buffer = this.buffer.subarray(index + 1);
      if (line.length > 0) {
        try {
          frames.push(decodeLine(line, this.secret));
        } catch (error: unknown) {
          errors.push(error instanceof Error ? error.message : String(error));
        }
      }
      index = this.buffer.indexOf(NEWLINE);
    }

    if (this.buffer.length > MAX_FRAME_BYTES) {
      this.buffer = Buffer.alloc(0);
      throw new TransportError(`frame exceeds ${MAX_FRAME_BYTES} bytes`);
    }
    return { frames, errors };
  }
}
