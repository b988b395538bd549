import * as v from "valibot";
import { ConfigError } from "./core/errors";
import { VOTE_STRATEGIES, type VoteStrategy } from "./core/policy";

export const MAX_PARTICIPANTS = 64;

const int = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  v.pipe(v.number(), v.integer(), v.minValue(min), v.maxValue(max));

const strategy = v.picklist(VOTE_STRATEGIES);

/** Run configuration; every duration is in milliseconds. */
export const RunConfigSchema = v.object({
  host: v.optional(v.pipe(v.string(), v.minLength(1)), "localhost"),
  port: v.optional(int(1, 65535), 8080),
  clients: v.optional(int(1, MAX_PARTICIPANTS), 3),
  voteStrategy: v.optional(strategy, "commit"),
  /** Keyed by participant id (`sequencer-B`) or zero-based index (`1`). */
  overrides: v.optional(v.record(v.string(), strategy), {}),
  sendTx: v.optional(v.boolean(), false),
  txCount: v.optional(int(1), 1),
  durationMs: v.optional(int(0), 30_000),
  staggerMs: v.optional(int(0), 500),
  joinTimeoutMs: v.optional(int(0), 2_000),
  readTimeoutMs: v.optional(int(1), 1_000),
});

export type RunConfigInput = v.InferInput<typeof RunConfigSchema>;
export type RunConfig = v.InferOutput<typeof RunConfigSchema>;

export const defaultRunConfig = (): RunConfig => parseRunConfig({});

/* ── participant naming ──────────────────────────────────── */

/** `sequencer-A` … `sequencer-Z`, then `sequencer-AA`, `sequencer-AB`, … */
export const participantId = (index: number): string => {
  let n = index;
  let suffix = "";
  do {
    suffix = String.fromCharCode(65 + (n % 26)) + suffix;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return `sequencer-${suffix}`;
};

const CHAIN_POOL: readonly (readonly [number, number])[] = [
  [0x12, 0x34],
  [0x13, 0x35],
  [0x14, 0x36],
];

/** Pool entries first, then `[0x15 + i, 0x37 + i]`. */
export const chainIdFor = (index: number): Uint8Array => {
  const fixed = CHAIN_POOL[index];
  return fixed ? Uint8Array.from(fixed) : Uint8Array.of(0x15 + index, 0x37 + index);
};

export const strategyFor = (config: RunConfig, index: number): VoteStrategy =>
  config.overrides[participantId(index)] ?? config.overrides[String(index)] ?? config.voteStrategy;

/* ── validation ──────────────────────────────────────────── */
export const parseRunConfig = (input: unknown): RunConfig => {
  const res = v.safeParse(RunConfigSchema, input);
  if (!res.success) {
    throw new ConfigError(res.issues.map((i) => `${v.getDotPath(i) ?? "config"}: ${i.message}`));
  }
  const config = res.output;
  const known = new Set<string>();
  for (let i = 0; i < config.clients; i++) known.add(participantId(i)).add(String(i));
  const unknown = Object.keys(config.overrides).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    throw new ConfigError(unknown.map((k) => `overrides.${k}: no such participant among ${config.clients}`));
  }
  return config;
};
