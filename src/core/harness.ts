import { chainIdFor, participantId, strategyFor, type RunConfig } from "../config";
import type { Connector } from "../infra/connection";
import { participantLogger, type Logger } from "../logging";
import { asClientId } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import { sleep } from "../utils/sleep";
import { Participant, type ParticipantOutcome } from "./participant";
import { makeVotePolicy, type DelayRange, type PolicyOptions, type Rng, type VoteStrategy } from "./policy";
import type { ParticipantStats } from "./types";

export type HarnessOptions = {
  logger: Logger;
  connect?: Connector;
  rng?: Rng;
  now?: () => number;
  policy?: Omit<PolicyOptions, "rng">;
  blockDelayMs?: DelayRange;
  proposalPauseMs?: DelayRange;
};

export type ParticipantReport = {
  clientId: string;
  chainId: string;
  strategy: VoteStrategy;
  initiator: boolean;
  /** False when the run was stopped before this participant's turn to connect. */
  started: boolean;
  outcome: "stopped" | "abandoned" | "disconnected" | "failed";
  error?: string;
  stats: ParticipantStats;
};

export type RunReport = {
  startedAt: number;
  finishedAt: number;
  participants: ParticipantReport[];
};

type Slot = {
  participant: Participant;
  strategy: VoteStrategy;
  initiator: boolean;
};

/**
 * Runs an ensemble of participants against one coordinator for a fixed
 * wall-clock duration. A participant failing never stops the others.
 */
export class Harness {
  private readonly slots: Slot[];
  private readonly log: Logger;
  private readonly stopper = new AbortController();

  constructor(private readonly config: RunConfig, private readonly opts: HarnessOptions) {
    this.log = opts.logger;
    this.slots = Array.from({ length: config.clients }, (_, i) => this.makeSlot(i));
  }

  get participants(): readonly Participant[] {
    return this.slots.map((s) => s.participant);
  }

  private makeSlot(i: number): Slot {
    const clientId = asClientId(participantId(i));
    const chainId = chainIdFor(i);
    const strategy = strategyFor(this.config, i);
    const participant = new Participant({
      clientId,
      chainId,
      policy: makeVotePolicy(strategy, { ...this.opts.policy, rng: this.opts.rng }),
      endpoint: { host: this.config.host, port: this.config.port },
      logger: participantLogger(this.log, clientId, bytesToHex(chainId)),
      connect: this.opts.connect,
      rng: this.opts.rng,
      now: this.opts.now,
      readTimeoutMs: this.config.readTimeoutMs,
      blockDelayMs: this.opts.blockDelayMs,
      proposalPauseMs: this.opts.proposalPauseMs,
    });
    return { participant, strategy, initiator: this.config.sendTx && i === 0 };
  }

  /** Ends the run early (e.g. on SIGINT); participants are then stopped and joined as usual. */
  stop(): void {
    this.stopper.abort();
  }

  async run(): Promise<RunReport> {
    const { config } = this;
    const startedAt = Date.now();
    this.log.info(
      { clients: config.clients, strategy: config.voteStrategy, durationMs: config.durationMs, sendTx: config.sendTx },
      `starting run against ${config.host}:${config.port}`,
    );

    const runs: Promise<ParticipantOutcome>[] = [];
    for (const [i, slot] of this.slots.entries()) {
      // Stopped during the staggered start: the rest never connect.
      if (this.stopper.signal.aborted) break;
      runs.push(slot.participant.run({ originate: slot.initiator, txCount: config.txCount }));
      if (i < this.slots.length - 1) await sleep(config.staggerMs, { signal: this.stopper.signal });
    }

    await sleep(config.durationMs, { signal: this.stopper.signal });
    this.log.info("run finished; stopping participants");
    for (const { participant } of this.slots) participant.stop();

    const participants = await Promise.all(
      this.slots.map((slot, i) => (i < runs.length ? this.join(slot, runs[i]) : unstartedReport(slot))),
    );
    const report = { startedAt, finishedAt: Date.now(), participants };
    this.logSummary(report);
    return report;
  }

  private async join(slot: Slot, run: Promise<ParticipantOutcome>): Promise<ParticipantReport> {
    const { participant } = slot;
    const joined = await Promise.race([
      run,
      sleep(this.config.joinTimeoutMs, { unref: true }).then(() => undefined),
    ]);
    const base = reportBase(slot);
    if (!joined) {
      participant.abandon();
      return { ...base, outcome: "abandoned" };
    }
    switch (joined.kind) {
      case "stopped":
        return { ...base, outcome: "stopped" };
      case "disconnected":
        return { ...base, outcome: "disconnected", error: joined.error.message };
      case "failed":
        return { ...base, outcome: "failed", error: errorMessage(joined.error) };
    }
  }

  private logSummary(report: RunReport): void {
    for (const p of report.participants) {
      this.log.info({ participant: p.clientId, outcome: p.outcome, ...p.stats }, "participant summary");
    }
  }
}

const reportBase = ({ participant, strategy, initiator }: Slot) => ({
  clientId: participant.clientId,
  chainId: bytesToHex(participant.chainId),
  strategy,
  initiator,
  started: true,
  stats: { ...participant.stats },
});

const unstartedReport = (slot: Slot): ParticipantReport => ({
  ...reportBase(slot),
  started: false,
  outcome: "stopped",
});

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
