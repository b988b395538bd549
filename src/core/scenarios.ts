import type { RunConfigInput } from "../config";

export type ScenarioName = "happy-path" | "abort-test" | "random-votes" | "timeout-test" | "stress-test";

export type Scenario = {
  description: string;
  config: RunConfigInput;
};

export const SCENARIOS: Readonly<Record<ScenarioName, Scenario>> = {
  "happy-path": {
    description: "All sequencers vote commit",
    config: { voteStrategy: "commit", sendTx: true, txCount: 2 },
  },
  "abort-test": {
    description: "Sequencers vote abort",
    config: { voteStrategy: "abort", sendTx: true, txCount: 1 },
  },
  "random-votes": {
    description: "Random voting behaviour",
    config: { voteStrategy: "random", sendTx: true, txCount: 3 },
  },
  "timeout-test": {
    description: "Delayed votes to trigger coordinator timeouts",
    config: { voteStrategy: "delay", sendTx: true, txCount: 1 },
  },
  "stress-test": {
    description: "Multiple clients and transactions",
    config: { clients: 5, voteStrategy: "random", sendTx: true, txCount: 5 },
  },
};

export const SCENARIO_NAMES: readonly ScenarioName[] = [
  "happy-path",
  "abort-test",
  "random-votes",
  "timeout-test",
  "stress-test",
];

export const isScenarioName = (s: string): s is ScenarioName => SCENARIO_NAMES.some((n) => n === s);
