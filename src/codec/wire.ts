import { DecodeError } from "../core/errors";
import { err, ok, type Result } from "../core/types";
import { concatBytes, utf8Bytes } from "../utils/bytes";
import { decodeVarint, encodeVarint, readVarint } from "./varint";

export enum WireType {
  Varint = 0,
  Fixed64 = 1,
  LengthDelimited = 2,
  Fixed32 = 5,
}

export type FieldTag = { field: number; wireType: number; at: number };

export const tagByte = (field: number, wireType: WireType): number =>
  ((field << 3) | wireType) >>> 0;

/* ── writer ──────────────────────────────────────────────── */
export class WireWriter {
  private parts: Uint8Array[] = [];

  private tag(field: number, wireType: WireType): this {
    this.parts.push(encodeVarint(tagByte(field, wireType)));
    return this;
  }

  uint32(field: number, value: number): this {
    this.tag(field, WireType.Varint);
    this.parts.push(encodeVarint(value));
    return this;
  }

  bool(field: number, value: boolean): this {
    return this.uint32(field, value ? 1 : 0);
  }

  /** Length is always a varint, even below 128. */
  bytes(field: number, value: Uint8Array): this {
    this.tag(field, WireType.LengthDelimited);
    this.parts.push(encodeVarint(value.length), value);
    return this;
  }

  string(field: number, value: string): this {
    return this.bytes(field, utf8Bytes(value));
  }

  finish(): Uint8Array {
    return concatBytes(this.parts);
  }
}

/* ── reader ──────────────────────────────────────────────── */
export class WireReader {
  private pos = 0;

  constructor(private readonly buf: Uint8Array) {}

  get done(): boolean {
    return this.pos >= this.buf.length;
  }

  tag(): Result<FieldTag, DecodeError> {
    const at = this.pos;
    const res = decodeVarint(this.buf, at);
    if (!res.ok) return res;
    this.pos += res.value.length;
    return ok({ field: res.value.value >>> 3, wireType: res.value.value & 0x07, at });
  }

  uint32(): Result<number, DecodeError> {
    const res = decodeVarint(this.buf, this.pos);
    if (!res.ok) return res;
    this.pos += res.value.length;
    return ok(res.value.value);
  }

  bool(): Result<boolean, DecodeError> {
    const res = readVarint(this.buf, this.pos);
    if (!res.ok) return res;
    this.pos += res.value.length;
    return ok(res.value.value !== 0);
  }

  /** Copies out, so callers never alias the frame buffer. */
  bytes(): Result<Uint8Array, DecodeError> {
    const at = this.pos;
    const len = this.uint32();
    if (!len.ok) return len;
    const end = this.pos + len.value;
    if (end > this.buf.length) {
      return err(DecodeError.truncated(at, len.value, this.buf.length - this.pos));
    }
    const out = new Uint8Array(this.buf.subarray(this.pos, end));
    this.pos = end;
    return ok(out);
  }

  skip(tag: FieldTag): Result<void, DecodeError> {
    switch (tag.wireType) {
      case WireType.Varint: {
        const res = readVarint(this.buf, this.pos);
        if (!res.ok) return res;
        this.pos += res.value.length;
        return ok(undefined);
      }
      case WireType.LengthDelimited: {
        const res = this.bytes();
        return res.ok ? ok(undefined) : res;
      }
      case WireType.Fixed64:
        return this.advance(tag, 8);
      case WireType.Fixed32:
        return this.advance(tag, 4);
      default:
        return err(DecodeError.invalidWireType(tag.at, tag.wireType));
    }
  }

  private advance(tag: FieldTag, n: number): Result<void, DecodeError> {
    const available = this.buf.length - this.pos;
    if (n > available) return err(DecodeError.truncated(tag.at, n, available));
    this.pos += n;
    return ok(undefined);
  }
}

/**
 * Calls `visit` for every field; a visit that returns `ok(false)` leaves the
 * field unread and it is skipped according to its wire type.
 */
export const walkFields = (
  buf: Uint8Array,
  visit: (tag: FieldTag, r: WireReader) => Result<boolean, DecodeError>,
): Result<void, DecodeError> => {
  const r = new WireReader(buf);
  while (!r.done) {
    const tag = r.tag();
    if (!tag.ok) return tag;
    const handled = visit(tag.value, r);
    if (!handled.ok) return handled;
    if (!handled.value) {
      const skipped = r.skip(tag.value);
      if (!skipped.ok) return skipped;
    }
  }
  return ok(undefined);
};

export const assign = <T>(
  res: Result<T, DecodeError>,
  set: (v: T) => void,
): Result<boolean, DecodeError> => {
  if (!res.ok) return res;
  set(res.value);
  return ok(true);
};

/** Wire type 2 as a nested message. */
export const nested = <T>(
  r: WireReader,
  decode: (buf: Uint8Array) => Result<T, DecodeError>,
): Result<T, DecodeError> => {
  const raw = r.bytes();
  return raw.ok ? decode(raw.value) : raw;
};
