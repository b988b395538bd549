import { FrameError } from "../core/errors";
import { err, ok, type Message, type Result } from "../core/types";
import { encodeMessage } from "./message";

export const FRAME_HEADER_BYTES = 4;
export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;

/** `[u32 big-endian length][body]` */
export const encodeFrame = (body: Uint8Array): Buffer => {
  const out = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.length);
  out.writeUInt32BE(body.length, 0);
  out.set(body, FRAME_HEADER_BYTES);
  return out;
};

export const frameMessage = (m: Message): Buffer => encodeFrame(encodeMessage(m));

/**
 * Reassembles frames from arbitrarily split stream chunks.
 */
export class FrameAccumulator {
  private buf: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  push(chunk: Uint8Array): void {
    this.buf = this.buf.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buf, chunk]);
  }

  /** Bytes held that do not yet form a complete frame. */
  get buffered(): number {
    return this.buf.length;
  }

  next(): Result<Uint8Array | undefined, FrameError> {
    if (this.buf.length < FRAME_HEADER_BYTES) return ok(undefined);
    const len = this.buf.readUInt32BE(0);
    if (len > this.maxFrameBytes) return err(FrameError.tooLarge(len, this.maxFrameBytes));
    const end = FRAME_HEADER_BYTES + len;
    if (this.buf.length < end) return ok(undefined);
    const frame = new Uint8Array(this.buf.subarray(FRAME_HEADER_BYTES, end));
    this.buf = this.buf.subarray(end);
    return ok(frame);
  }
}
