import type { DecodeError } from "../core/errors";
import {
  ok,
  type Block,
  type Decided,
  type Message,
  type Payload,
  type Result,
  type TransactionRequest,
  type Vote,
  type XTRequest,
} from "../core/types";
import { utf8String } from "../utils/bytes";
import { assign, nested, walkFields, WireType, WireWriter } from "./wire";

/* ── field numbers ───────────────────────────────────────── */
export const MessageField = {
  SenderId: 1,
  XTRequest: 2,
  Vote: 3,
  Decided: 4,
  Block: 5,
} as const;

const LEN = WireType.LengthDelimited;
const VARINT = WireType.Varint;

/* ── encode ──────────────────────────────────────────────── */
export const encodeTransactionRequest = (t: TransactionRequest): Uint8Array => {
  const w = new WireWriter().bytes(1, t.chainId);
  for (const tx of t.transactions) w.bytes(2, tx);
  return w.finish();
};

export const encodeXTRequest = (x: XTRequest): Uint8Array => {
  const w = new WireWriter();
  for (const t of x.transactions) w.bytes(1, encodeTransactionRequest(t));
  return w.finish();
};

export const encodeVote = (v: Vote): Uint8Array =>
  new WireWriter().bytes(1, v.senderChainId).uint32(2, v.xtId).bool(3, v.vote).finish();

export const encodeDecided = (d: Decided): Uint8Array =>
  new WireWriter().uint32(1, d.xtId).bool(2, d.decision).finish();

export const encodeBlock = (b: Block): Uint8Array => {
  const w = new WireWriter().bytes(1, b.chainId).bytes(2, b.blockData);
  for (const id of b.includedXtIds) w.uint32(3, id);
  return w.finish();
};

const encodePayload = (w: WireWriter, p: Payload): void => {
  switch (p.type) {
    case "xtRequest":
      w.bytes(MessageField.XTRequest, encodeXTRequest(p.xtRequest));
      return;
    case "vote":
      w.bytes(MessageField.Vote, encodeVote(p.vote));
      return;
    case "decided":
      w.bytes(MessageField.Decided, encodeDecided(p.decided));
      return;
    case "block":
      w.bytes(MessageField.Block, encodeBlock(p.block));
      return;
  }
};

export const encodeMessage = (m: Message): Uint8Array => {
  const w = new WireWriter().string(MessageField.SenderId, m.senderId);
  if (m.payload) encodePayload(w, m.payload);
  return w.finish();
};

/* ── decode ──────────────────────────────────────────────── */
export const decodeTransactionRequest = (
  buf: Uint8Array,
): Result<TransactionRequest, DecodeError> => {
  const t: TransactionRequest = { chainId: new Uint8Array(0), transactions: [] };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (field === 1 && wireType === LEN) return assign(r.bytes(), (v) => { t.chainId = v; });
    if (field === 2 && wireType === LEN) return assign(r.bytes(), (v) => { t.transactions.push(v); });
    return ok(false);
  });
  return res.ok ? ok(t) : res;
};

export const decodeXTRequest = (buf: Uint8Array): Result<XTRequest, DecodeError> => {
  const x: XTRequest = { transactions: [] };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (field === 1 && wireType === LEN) {
      return assign(nested(r, decodeTransactionRequest), (v) => { x.transactions.push(v); });
    }
    return ok(false);
  });
  return res.ok ? ok(x) : res;
};

export const decodeVote = (buf: Uint8Array): Result<Vote, DecodeError> => {
  const v: Vote = { senderChainId: new Uint8Array(0), xtId: 0, vote: false };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (field === 1 && wireType === LEN) return assign(r.bytes(), (b) => { v.senderChainId = b; });
    if (field === 2 && wireType === VARINT) return assign(r.uint32(), (n) => { v.xtId = n; });
    if (field === 3 && wireType === VARINT) return assign(r.bool(), (b) => { v.vote = b; });
    return ok(false);
  });
  return res.ok ? ok(v) : res;
};

export const decodeDecided = (buf: Uint8Array): Result<Decided, DecodeError> => {
  const d: Decided = { xtId: 0, decision: false };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (field === 1 && wireType === VARINT) return assign(r.uint32(), (n) => { d.xtId = n; });
    if (field === 2 && wireType === VARINT) return assign(r.bool(), (b) => { d.decision = b; });
    return ok(false);
  });
  return res.ok ? ok(d) : res;
};

export const decodeBlock = (buf: Uint8Array): Result<Block, DecodeError> => {
  const b: Block = { chainId: new Uint8Array(0), blockData: new Uint8Array(0), includedXtIds: [] };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (field === 1 && wireType === LEN) return assign(r.bytes(), (v) => { b.chainId = v; });
    if (field === 2 && wireType === LEN) return assign(r.bytes(), (v) => { b.blockData = v; });
    if (field === 3 && wireType === VARINT) return assign(r.uint32(), (n) => { b.includedXtIds.push(n); });
    return ok(false);
  });
  return res.ok ? ok(b) : res;
};

/**
 * Decodes one Message. Unknown fields are skipped; when a payload field
 * repeats, the last occurrence wins.
 */
export const decodeMessage = (buf: Uint8Array): Result<Message, DecodeError> => {
  const m: Message = { senderId: "" };
  const res = walkFields(buf, ({ field, wireType }, r) => {
    if (wireType !== LEN) return ok(false);
    switch (field) {
      case MessageField.SenderId:
        return assign(r.bytes(), (v) => { m.senderId = utf8String(v); });
      case MessageField.XTRequest:
        return assign(nested(r, decodeXTRequest), (xtRequest) => { m.payload = { type: "xtRequest", xtRequest }; });
      case MessageField.Vote:
        return assign(nested(r, decodeVote), (vote) => { m.payload = { type: "vote", vote }; });
      case MessageField.Decided:
        return assign(nested(r, decodeDecided), (decided) => { m.payload = { type: "decided", decided }; });
      case MessageField.Block:
        return assign(nested(r, decodeBlock), (block) => { m.payload = { type: "block", block }; });
      default:
        return ok(false);
    }
  });
  return res.ok ? ok(m) : res;
};
