import { describe, it, expect } from "vitest";
import { decodeLine, encodeFrame, FrameDecoder, MAX_FRAME_BYTES, signPayload } from "./frame-codec.js";
import { TransportError } from "../types/errors.js";
import type { BusFrame } from "../teams/message-bus.js";

const SECRET = "test-secret";

const HEARTBEAT: BusFrame = {
  kind: "publish",
  topic: "agent.heartbeat",
  message: { agentId: "dev-1", healthy: true },
};

describe("encodeFrame / decodeLine", () => {
  it("produces one signed line that decodes to the same frame", () => {
    const line = encodeFrame(HEARTBEAT, SECRET);

    expect(line.endsWith("\n")).toBe(true);
    expect(line.indexOf("\n")).toBe(line.length - 1);
    expect(decodeLine(line.trimEnd(), SECRET)).toEqual(HEARTBEAT);
  });

  it("rejects a frame signed with another secret", () => {
    const line = encodeFrame(HEARTBEAT, "other-secret").trimEnd();
    expect(() => decodeLine(line, SECRET)).toThrow("Transport error: frame authentication failed");
  });

  it("rejects a tampered payload", () => {
    const payload = JSON.stringify({ kind: "claim", agentId: "dev-1" });
    const hmac = signPayload(payload, SECRET);
    const tampered = JSON.stringify({ payload: payload.replace("dev-1", "dev-2"), hmac });

    expect(() => decodeLine(tampered, SECRET)).toThrow("frame authentication failed");
  });

  it("rejects lines that are not well-formed frames", () => {
    expect(() => decodeLine("{oops", SECRET)).toThrow("Transport error: frame is not valid JSON");
    expect(() => decodeLine(JSON.stringify({ payload: "{}", hmac: "xyz" }), SECRET)).toThrow(
      "Transport error: frame envelope is malformed",
    );

    const payload = JSON.stringify({ kind: "publish", topic: "agent.dance", message: {} });
    const line = JSON.stringify({ payload, hmac: signPayload(payload, SECRET) });
    expect(() => decodeLine(line, SECRET)).toThrow("Transport error: frame is malformed: unknown topic");
  });
});

describe("FrameDecoder", () => {
  it("reassembles frames split across chunks and reports bad lines", () => {
    const decoder = new FrameDecoder(SECRET);
    const claim: BusFrame = { kind: "claim", agentId: "dev-1" };
    const stream = encodeFrame(claim, SECRET) + "garbage\n" + encodeFrame(HEARTBEAT, SECRET);
    const cut = 10;

    const first = decoder.push(Buffer.from(stream.slice(0, cut)));
    expect(first).toEqual({ frames: [], errors: [] });

    const second = decoder.push(Buffer.from(stream.slice(cut)));
    expect(second.frames).toEqual([claim, HEARTBEAT]);
    expect(second.errors).toEqual(["Transport error: frame is not valid JSON"]);
  });

  it("throws once a partial line grows past the frame limit", () => {
    const decoder = new FrameDecoder(SECRET);
    expect(() => decoder.push(Buffer.alloc(MAX_FRAME_BYTES + 1, 0x61))).toThrow(TransportError);
    expect(decoder.push(Buffer.from(encodeFrame(HEARTBEAT, SECRET))).frames).toEqual([HEARTBEAT]);
  });
});
