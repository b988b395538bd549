import { PolicyError } from "./errors";
import type { XtId } from "../types/brands";

export type VoteStrategy = "commit" | "abort" | "random" | "delay";
export const VOTE_STRATEGIES: readonly VoteStrategy[] = ["commit", "abort", "random", "delay"];

export type Rng = () => number; // uniform in [0, 1)

export type DelayRange = readonly [minMs: number, maxMs: number];

export type VoteDecision = { decision: boolean; delayMs: number };

/** Resolved once per participant. */
export type VotePolicy =
  | { kind: "commit"; delayMs: number }
  | { kind: "abort"; delayMs: number }
  | { kind: "random"; delayMs: number }
  | { kind: "delay"; range: DelayRange }
  | { kind: "custom"; delayMs: number; decide: (xtId: XtId) => VoteDecision };

export type PolicyOptions = {
  rng?: Rng;
  /** Base response delay, drawn once per participant. */
  voteDelayMs?: DelayRange;
  /** Redrawn per vote; meant to outlast the coordinator's vote timeout. */
  lateVoteMs?: DelayRange;
};

export const DEFAULT_VOTE_DELAY_MS: DelayRange = [500, 2000];
export const DEFAULT_LATE_VOTE_MS: DelayRange = [3000, 6000];

export const uniform = (rng: Rng, [min, max]: DelayRange): number => min + rng() * (max - min);

export const makeVotePolicy = (strategy: VoteStrategy, opts: PolicyOptions = {}): VotePolicy => {
  const rng = opts.rng ?? Math.random;
  switch (strategy) {
    case "delay":
      return { kind: "delay", range: opts.lateVoteMs ?? DEFAULT_LATE_VOTE_MS };
    case "commit":
    case "abort":
    case "random":
      return { kind: strategy, delayMs: uniform(rng, opts.voteDelayMs ?? DEFAULT_VOTE_DELAY_MS) };
  }
};

/** Wraps an external decision function; see `decideVote` for its fallback. */
export const customPolicy = (
  decide: (xtId: XtId) => VoteDecision,
  opts: PolicyOptions = {},
): VotePolicy => ({
  kind: "custom",
  delayMs: uniform(opts.rng ?? Math.random, opts.voteDelayMs ?? DEFAULT_VOTE_DELAY_MS),
  decide,
});

/**
 * Never throws. A custom policy that fails, or yields an unusable delay,
 * degrades to a commit vote after the base delay and reports why.
 */
export const decideVote = (
  policy: VotePolicy,
  xtId: XtId,
  rng: Rng = Math.random,
  onError?: (e: PolicyError) => void,
): VoteDecision => {
  switch (policy.kind) {
    case "commit":
      return { decision: true, delayMs: policy.delayMs };
    case "abort":
      return { decision: false, delayMs: policy.delayMs };
    case "random":
      return { decision: rng() < 0.5, delayMs: policy.delayMs };
    case "delay":
      return { decision: true, delayMs: uniform(rng, policy.range) };
    case "custom":
      try {
        const out = policy.decide(xtId);
        if (!Number.isFinite(out.delayMs) || out.delayMs < 0) {
          throw new PolicyError(`custom policy returned delay ${out.delayMs} for xt_id=${xtId}`);
        }
        return out;
      } catch (e) {
        onError?.(e instanceof PolicyError ? e : new PolicyError(`custom policy failed for xt_id=${xtId}`, { cause: e }));
        return { decision: true, delayMs: policy.delayMs };
      }
  }
};

export const describePolicy = (p: VotePolicy): string =>
  p.kind === "delay"
    ? `delay(${p.range[0]}-${p.range[1]}ms)`
    : `${p.kind}(${Math.round(p.delayMs)}ms)`;
