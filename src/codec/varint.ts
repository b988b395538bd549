import { DecodeError } from "../core/errors";
import { err, ok, type Result } from "../core/types";
import { MAX_UINT32 } from "../types/brands";

// 64-bit varints from other message types still have to be skippable.
const MAX_VARINT_BYTES = 10;
const MAX_UINT32_VARINT_BYTES = 5;

export const encodeVarint = (value: number): Uint8Array => {
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
    throw new RangeError(`varint value out of uint32 range: ${value}`);
  }
  const out: number[] = [];
  let v = value;
  while (v > 0x7f) {
    out.push((v & 0x7f) | 0x80);
    v >>>= 7;
  }
  out.push(v);
  return Uint8Array.from(out);
};

export type DecodedVarint = { value: number; length: number };

/** Reads any varint up to 10 bytes. Values past 2^53 lose precision. */
export const readVarint = (
  buf: Uint8Array,
  offset: number,
): Result<DecodedVarint, DecodeError> => {
  let value = 0;
  let scale = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const at = offset + i;
    if (at >= buf.length) return err(DecodeError.malformedVarint(offset));
    const byte = buf[at];
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) return ok({ value, length: i + 1 });
    scale *= 128;
  }
  return err(DecodeError.malformedVarint(offset));
};

export const decodeVarint = (
  buf: Uint8Array,
  offset = 0,
): Result<DecodedVarint, DecodeError> => {
  const res = readVarint(buf, offset);
  if (res.ok && (res.value.length > MAX_UINT32_VARINT_BYTES || res.value.value > MAX_UINT32)) {
    return err(DecodeError.malformedVarint(offset));
  }
  return res;
};
