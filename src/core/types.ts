import type { XtId } from "../types/brands";

/* ── wire payloads ───────────────────────────────────────── */
export type TransactionRequest = {
  chainId: Uint8Array;
  transactions: Uint8Array[]; // raw tx payloads
};

export type XTRequest = {
  transactions: TransactionRequest[];
};

export type Vote = {
  senderChainId: Uint8Array;
  xtId: number;
  vote: boolean;
};

export type Decided = {
  xtId: number;
  decision: boolean;
};

export type Block = {
  chainId: Uint8Array;
  blockData: Uint8Array;
  includedXtIds: number[];
};

/* ── envelope ────────────────────────────────────────────── */
export type Payload =
  | { type: "xtRequest"; xtRequest: XTRequest }
  | { type: "vote"; vote: Vote }
  | { type: "decided"; decided: Decided }
  | { type: "block"; block: Block };

export type PayloadType = Payload["type"];

export type Message = {
  senderId: string;
  payload?: Payload; // absent when no recognised payload field was on the wire
};

/* ── explicit decode results ─────────────────────────────── */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

/* ── participant-side state ──────────────────────────────── */
export enum SequencerState {
  Idle = "idle",
  Voting = "voting",
  Committed = "committed",
  Aborted = "aborted",
}

export type TxPhase = SequencerState.Voting | SequencerState.Committed;

export type PendingTx = {
  xtId: XtId;
  decision: boolean;
  delayMs: number;
  phase: TxPhase;
};

export type ParticipantStats = {
  proposalsSent: number;
  proposalsReceived: number;
  votesSent: number;
  decisionsReceived: number;
  blocksSent: number;
  framesDiscarded: number;
};
