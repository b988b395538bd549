import yargs from "yargs";
import { parseRunConfig, type RunConfig, type RunConfigInput } from "../config";
import { ConfigError } from "../core/errors";
import { VOTE_STRATEGIES } from "../core/policy";
import { SCENARIOS, SCENARIO_NAMES, isScenarioName } from "../core/scenarios";
import { LOG_LEVELS, type LogLevel } from "../logging";

export type CliOptions = {
  scenario?: string;
  config: RunConfig;
  logLevel: LogLevel;
};

const isLogLevel = (s: string | undefined): s is LogLevel =>
  s !== undefined && LOG_LEVELS.some((l) => l === s);

const seconds = (s: number | undefined): number | undefined =>
  s === undefined ? undefined : Math.round(s * 1000);

/** `sequencer-B=abort` → `{ "sequencer-B": "abort" }` */
export const parseOverrides = (pairs: readonly string[]): Record<string, string> => {
  const out: Record<string, string> = {};
  const bad: string[] = [];
  for (const pair of pairs) {
    const at = pair.indexOf("=");
    if (at <= 0 || at === pair.length - 1) bad.push(`override "${pair}": expected <participant>=<strategy>`);
    else out[pair.slice(0, at)] = pair.slice(at + 1);
  }
  if (bad.length > 0) throw new ConfigError(bad);
  return out;
};

/** Parses argv (without node and script) into a validated run configuration. */
export const parseCli = async (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<CliOptions> => {
  const args = await yargs([...argv])
    .scriptName("2pc-sim")
    .usage("$0 [scenario] [options]")
    .command("$0 [scenario]", "Run simulated sequencers against a 2PC coordinator", (y) =>
      y.positional("scenario", { type: "string", choices: SCENARIO_NAMES, describe: "Preset run configuration" }),
    )
    .option("host", { type: "string", describe: "Coordinator host (default localhost)" })
    .option("port", { type: "number", describe: "Coordinator port (default 8080)" })
    .option("clients", { type: "number", describe: "Number of sequencer clients (default 3)" })
    .option("vote-strategy", { type: "string", choices: VOTE_STRATEGIES, describe: "Vote strategy for all clients" })
    .option("override", { type: "string", array: true, describe: "Per-client strategy, e.g. sequencer-B=abort" })
    .option("send-tx", { type: "boolean", describe: "Have the first client originate transactions" })
    .option("tx-count", { type: "number", describe: "Transactions to originate (default 1)" })
    .option("duration", { type: "number", describe: "Run duration in seconds (default 30)" })
    .option("stagger", { type: "number", describe: "Seconds between client connections (default 0.5)" })
    .option("log-level", { type: "string", choices: LOG_LEVELS, describe: "Log level (env LOG_LEVEL)" })
    .strict()
    .help()
    .fail((msg, e) => {
      throw e ?? new ConfigError([msg]);
    })
    .parseAsync();

  const scenario = typeof args.scenario === "string" ? args.scenario : undefined;
  const preset: RunConfigInput = scenario && isScenarioName(scenario) ? SCENARIOS[scenario].config : {};

  const flags: Record<string, unknown> = {
    host: args.host,
    port: args.port,
    clients: args.clients,
    voteStrategy: args["vote-strategy"],
    overrides: args.override ? parseOverrides(args.override) : undefined,
    sendTx: args["send-tx"],
    txCount: args["tx-count"],
    durationMs: seconds(args.duration),
    staggerMs: seconds(args.stagger),
  };
  const explicit = Object.fromEntries(Object.entries(flags).filter(([, value]) => value !== undefined));

  const logLevel = args["log-level"] ?? env.LOG_LEVEL;
  return {
    scenario,
    config: parseRunConfig({ ...preset, ...explicit }),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
};
