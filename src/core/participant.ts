import { xtDigest } from "../codec/digest";
import { decodeMessage } from "../codec/message";
import { frameMessage } from "../codec/frame";
import { connectTcp, type Connection, type Connector, type Endpoint } from "../infra/connection";
import type { Logger } from "../logging";
import { asXtId, type ClientId, type XtId } from "../types/brands";
import { bytesToHex, utf8Bytes } from "../utils/bytes";
import { sleep } from "../utils/sleep";
import type { ConnectionError, FrameError } from "./errors";
import { decideVote, describePolicy, uniform, type DelayRange, type Rng, type VotePolicy } from "./policy";
import {
  SequencerState,
  type Decided,
  type Message,
  type ParticipantStats,
  type Payload,
  type PendingTx,
  type XTRequest,
} from "./types";

/* ── defaults ────────────────────────────────────────────── */
export const DEFAULT_READ_TIMEOUT_MS = 1000;
export const DEFAULT_BLOCK_DELAY_MS: DelayRange = [500, 1500];
export const DEFAULT_PROPOSAL_PAUSE_MS: DelayRange = [1000, 3000];

/** Chains named by a self-originated proposal. */
export const DEFAULT_XT_CHAINS: readonly Uint8Array[] = [
  Uint8Array.of(0x12, 0x34),
  Uint8Array.of(0x13, 0x35),
  Uint8Array.of(0x14, 0x36),
];

export const placeholderTx = (i: number): Uint8Array => Uint8Array.of(0x01, 0x02, 0x03, 0x04, 0x05 + i);

export const defaultXTRequest = (chains: readonly Uint8Array[] = DEFAULT_XT_CHAINS): XTRequest => ({
  transactions: chains.map((chainId, i) => ({ chainId, transactions: [placeholderTx(i)] })),
});

export const blockData = (clientId: string, nowMs: number, count: number): Uint8Array =>
  utf8Bytes(`Block from ${clientId} at ${(nowMs / 1000).toFixed(2)} with ${count} TXs`);

export type ParticipantOptions = {
  clientId: ClientId;
  chainId: Uint8Array;
  policy: VotePolicy;
  endpoint: Endpoint;
  logger: Logger;
  connect?: Connector;
  rng?: Rng;
  now?: () => number;
  readTimeoutMs?: number;
  blockDelayMs?: DelayRange;
  proposalPauseMs?: DelayRange;
};

export type Lifecycle = "created" | "running" | "stopped";

/** Why the receive loop ended. */
export type ParticipantOutcome =
  | { kind: "stopped" }
  | { kind: "disconnected"; error: ConnectionError | FrameError }
  | { kind: "failed"; error: unknown };

/**
 * One simulated sequencer. Owns its connection and every piece of state it
 * touches; nothing here is shared with other participants.
 *
 * The xt_id of a broadcast proposal is not on the wire, so it is inferred
 * from a local counter (coordinator ids start at 1 and are sequential). The
 * guess is advisory: it drifts if this participant misses a broadcast.
 */
export class Participant {
  readonly clientId: ClientId;
  readonly chainId: Uint8Array;
  readonly policy: VotePolicy;

  private readonly opts: ParticipantOptions;
  private readonly log: Logger;
  private readonly rng: Rng;
  private readonly now: () => number;
  private readonly stopper = new AbortController();

  private conn?: Connection;
  private lifecycle: Lifecycle = "created";
  private _outcome?: ParticipantOutcome;
  private _state: SequencerState = SequencerState.Idle;
  private xtCounter = 0;
  private readonly pending = new Map<XtId, PendingTx>();
  private readonly inflight = new Set<Promise<void>>();
  private writeChain: Promise<void> = Promise.resolve();

  readonly stats: ParticipantStats = {
    proposalsSent: 0,
    proposalsReceived: 0,
    votesSent: 0,
    decisionsReceived: 0,
    blocksSent: 0,
    framesDiscarded: 0,
  };

  constructor(opts: ParticipantOptions) {
    this.opts = opts;
    this.clientId = opts.clientId;
    this.chainId = opts.chainId;
    this.policy = opts.policy;
    this.log = opts.logger;
    this.rng = opts.rng ?? Math.random;
    this.now = opts.now ?? Date.now;
  }

  /* ── observable state ──────────────────────────────────── */
  get running(): boolean {
    return this.lifecycle === "running";
  }

  get lifecycleState(): Lifecycle {
    return this.lifecycle;
  }

  /** Advisory: reflects the most recent transition of any transaction. */
  get state(): SequencerState {
    return this._state;
  }

  get outcome(): ParticipantOutcome | undefined {
    return this._outcome;
  }

  get lastXtId(): number {
    return this.xtCounter;
  }

  pendingTx(xtId: number): Readonly<PendingTx> | undefined {
    return this.pending.get(asXtId(xtId));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Resolves when every scheduled vote and block send has finished. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) await Promise.allSettled([...this.inflight]);
  }

  /* ── lifecycle ─────────────────────────────────────────── */
  async connect(): Promise<void> {
    if (this.lifecycle !== "created") throw new Error(`${this.clientId} already connected once`);
    const connect = this.opts.connect ?? connectTcp;
    const { host, port } = this.opts.endpoint;
    const { signal } = this.stopper;
    let conn: Connection;
    try {
      conn = await connect(this.opts.endpoint, signal);
    } catch (e) {
      if (signal.aborted) return this.finish({ kind: "stopped" });
      this.finish({ kind: "failed", error: e });
      throw e;
    }
    // Stopped or abandoned while the connect was in flight.
    if (signal.aborted) {
      conn.destroy();
      return this.finish({ kind: "stopped" });
    }
    this.conn = conn;
    this.lifecycle = "running";
    this.log.info({ host, port, policy: describePolicy(this.policy) }, "connected");
  }

  /**
   * Connects, then runs the receive loop (and, for an initiator, the
   * proposal schedule) until stopped or disconnected. Never rejects.
   */
  async run(opts: { originate?: boolean; txCount?: number } = {}): Promise<ParticipantOutcome> {
    try {
      await this.connect();
    } catch (e) {
      this.log.error({ err: e }, "connect failed");
      return this.outcome ?? { kind: "failed", error: e };
    }
    if (!this.running) return this.outcome ?? { kind: "stopped" };
    await Promise.all([
      this.receiveLoop(),
      opts.originate ? this.originate(opts.txCount ?? 1) : Promise.resolve(),
    ]);
    return this.outcome ?? { kind: "stopped" };
  }

  /** Cooperative: the receive loop notices at its next read timeout. */
  stop(): void {
    this.stopper.abort();
  }

  /** Force-closes the socket, or a connect still in flight, without waiting for the loop. */
  abandon(): void {
    this.stopper.abort();
    this.conn?.destroy();
    if (this.lifecycle !== "stopped") {
      this.log.warn("abandoned");
      this.finish({ kind: "stopped" });
    }
  }

  async receiveLoop(): Promise<void> {
    const conn = this.conn;
    if (!conn) throw new Error(`${this.clientId} is not connected`);
    const timeoutMs = this.opts.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

    while (this.running && !this.stopper.signal.aborted) {
      const res = await conn.readFrame(timeoutMs);
      if (res.kind === "timeout") continue;
      if (res.kind === "closed") {
        this.log.warn({ reason: res.error.message }, "disconnected");
        this.finish({ kind: "disconnected", error: res.error });
        return;
      }
      this.handleFrame(res.frame);
    }
    conn.close();
    if (this.lifecycle !== "stopped") {
      this.log.info("disconnected");
      this.finish({ kind: "stopped" });
    }
  }

  private finish(outcome: ParticipantOutcome): void {
    this.lifecycle = "stopped";
    this._outcome ??= outcome;
  }

  /* ── inbound ───────────────────────────────────────────── */
  handleFrame(frame: Uint8Array): void {
    const res = decodeMessage(frame);
    if (!res.ok) {
      this.stats.framesDiscarded++;
      this.log.warn({ kind: res.error.kind, bytes: frame.length }, `discarded frame: ${res.error.message}`);
      return;
    }
    this.handleMessage(res.value);
  }

  handleMessage(m: Message): void {
    const p = m.payload;
    if (!p) {
      this.log.debug({ from: m.senderId }, "message without payload");
      return;
    }
    switch (p.type) {
      case "xtRequest":
        this.onXTRequest(m.senderId, p.xtRequest);
        return;
      case "decided":
        this.onDecided(p.decided);
        return;
      case "vote":
      case "block":
        this.log.debug({ from: m.senderId, type: p.type }, "ignoring peer message");
        return;
    }
  }

  private onXTRequest(from: string, req: XTRequest): void {
    this.stats.proposalsReceived++;
    const xtId = this.nextXtId();
    this.log.info({ from, xtId, digest: xtDigest(req), chains: req.transactions.length }, "proposal received");
    this.scheduleVote(xtId);
  }

  private onDecided(d: Decided): void {
    this.stats.decisionsReceived++;
    const xtId = asXtId(d.xtId);
    this.log.info({ xtId, decision: d.decision ? "COMMIT" : "ABORT" }, "decision received");

    const tx = this.pending.get(xtId);
    if (!tx || tx.phase === SequencerState.Committed) {
      this.log.debug({ xtId }, "no transaction awaiting a decision");
      return;
    }
    if (!d.decision) {
      this._state = SequencerState.Aborted;
      this.pending.delete(xtId);
      return;
    }
    tx.phase = SequencerState.Committed;
    this._state = SequencerState.Committed;
    const settleMs = uniform(this.rng, this.opts.blockDelayMs ?? DEFAULT_BLOCK_DELAY_MS);
    this.later(settleMs, async () => {
      const included = [xtId];
      const sent = await this.send({
        type: "block",
        block: { chainId: this.chainId, blockData: blockData(this.clientId, this.now(), included.length), includedXtIds: included },
      });
      this.pending.delete(xtId);
      if (sent) {
        this.stats.blocksSent++;
        this.log.info({ xtId }, "block sent");
      }
    });
  }

  /* ── outbound ──────────────────────────────────────────── */
  /** Sends an XTRequest, then votes on it like any other proposal. */
  async propose(chains: readonly Uint8Array[] = DEFAULT_XT_CHAINS): Promise<XtId | undefined> {
    const req = defaultXTRequest(chains);
    const sent = await this.send({ type: "xtRequest", xtRequest: req });
    if (!sent) return undefined;
    this.stats.proposalsSent++;
    const xtId = this.nextXtId();
    this.log.info({ xtId, digest: xtDigest(req), chains: chains.length }, "proposal sent");
    this.scheduleVote(xtId);
    return xtId;
  }

  private async originate(txCount: number): Promise<void> {
    const pause = this.opts.proposalPauseMs ?? DEFAULT_PROPOSAL_PAUSE_MS;
    for (let i = 0; i < txCount; i++) {
      const elapsed = await sleep(uniform(this.rng, pause), { signal: this.stopper.signal });
      if (!elapsed || !this.running) return;
      await this.propose();
    }
  }

  private nextXtId(): XtId {
    this.xtCounter += 1;
    return asXtId(this.xtCounter);
  }

  private scheduleVote(xtId: XtId): void {
    const { decision, delayMs } = decideVote(this.policy, xtId, this.rng, (e) =>
      this.log.warn({ err: e, xtId }, "vote policy failed; voting commit"),
    );
    this.pending.set(xtId, { xtId, decision, delayMs, phase: SequencerState.Voting });
    this._state = SequencerState.Voting;

    // Late votes are still sent: the coordinator may already have timed out.
    this.later(delayMs, async () => {
      const sent = await this.send({ type: "vote", vote: { senderChainId: this.chainId, xtId, vote: decision } });
      if (sent) {
        this.stats.votesSent++;
        this.log.info({ xtId, vote: decision ? "COMMIT" : "ABORT", delayMs: Math.round(delayMs) }, "vote sent");
      }
    });
  }

  /** Writes are chained so frames never interleave on the socket. */
  private send(payload: Payload): Promise<boolean> {
    const frame = frameMessage({ senderId: this.clientId, payload });
    const attempt = this.writeChain.then(async () => {
      const conn = this.conn;
      if (!conn?.open) {
        this.log.debug({ type: payload.type }, "connection closed; dropping send");
        return false;
      }
      await conn.write(frame);
      return true;
    }).catch((e: unknown) => {
      this.log.warn({ err: e, type: payload.type }, "send failed");
      return false;
    });
    this.writeChain = attempt.then(() => undefined);
    return attempt;
  }

  private later(ms: number, task: () => Promise<void>): void {
    const run = sleep(ms, { unref: true })
      .then(task)
      .catch((e: unknown) => this.log.error({ err: e }, "scheduled send failed"))
      .finally(() => this.inflight.delete(run));
    this.inflight.add(run);
  }

  toString(): string {
    return `${this.clientId}(${bytesToHex(this.chainId)})`;
  }
}
