import { describe, it, expect } from "vitest";
import { encodeFrame, FrameAccumulator, frameMessage } from "../src/codec/frame";
import { decodeMessage } from "../src/codec/message";

describe("framing", () => {
  it("prefixes the body with a big-endian u32 length", () => {
    expect([...encodeFrame(Uint8Array.of(1, 2, 3))]).toEqual([0, 0, 0, 3, 1, 2, 3]);
    const big = encodeFrame(new Uint8Array(0x0102));
    expect([...big.subarray(0, 4)]).toEqual([0, 0, 1, 2]);
  });

  it("reassembles frames split across arbitrary chunks", () => {
    const acc = new FrameAccumulator();
    acc.push(Uint8Array.of(0, 0));
    expect(acc.next()).toEqual({ ok: true, value: undefined });
    acc.push(Uint8Array.of(0, 3, 1));
    expect(acc.next()).toEqual({ ok: true, value: undefined });
    acc.push(Uint8Array.of(2, 3, 0, 0, 0, 1, 9));

    expect(acc.next()).toEqual({ ok: true, value: Uint8Array.of(1, 2, 3) });
    expect(acc.next()).toEqual({ ok: true, value: Uint8Array.of(9) });
    expect(acc.next()).toEqual({ ok: true, value: undefined });
    expect(acc.buffered).toBe(0);
  });

  it("reports how much of an incomplete frame is buffered", () => {
    const acc = new FrameAccumulator();
    acc.push(Uint8Array.of(0, 0, 0, 50, ...new Array<number>(10).fill(0xaa)));
    expect(acc.next()).toEqual({ ok: true, value: undefined });
    expect(acc.buffered).toBe(14);
  });

  it("yields an empty body for a zero-length frame", () => {
    const acc = new FrameAccumulator();
    acc.push(Uint8Array.of(0, 0, 0, 0));
    expect(acc.next()).toEqual({ ok: true, value: new Uint8Array(0) });
  });

  it("rejects frames above the size limit", () => {
    const acc = new FrameAccumulator(16);
    acc.push(Uint8Array.of(0, 0, 0, 17));
    const res = acc.next();
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe("FrameTooLarge");
  });

  it("frames an encoded message", () => {
    const frame = frameMessage({ senderId: "sequencer-A", payload: { type: "decided", decided: { xtId: 3, decision: false } } });
    expect(frame.readUInt32BE(0)).toBe(frame.length - 4);
    expect(decodeMessage(frame.subarray(4))).toEqual({
      ok: true,
      value: { senderId: "sequencer-A", payload: { type: "decided", decided: { xtId: 3, decision: false } } },
    });
  });
});
