import { describe, expect, it } from "vitest";
import { parseCli, parseOverrides } from "../src/cli/options";
import { chainIdFor, defaultRunConfig, parseRunConfig, participantId, strategyFor } from "../src/config";
import { ConfigError } from "../src/core/errors";
import { isScenarioName, SCENARIO_NAMES, SCENARIOS } from "../src/core/scenarios";

describe("participant naming", () => {
  it.each([
    [0, "sequencer-A"],
    [1, "sequencer-B"],
    [25, "sequencer-Z"],
    [26, "sequencer-AA"],
    [27, "sequencer-AB"],
    [701, "sequencer-ZZ"],
    [702, "sequencer-AAA"],
  ])("index %i is %s", (i, id) => {
    expect(participantId(i)).toBe(id);
  });

  it("draws chain ids from the pool, then derives them", () => {
    expect([0, 1, 2, 3, 4].map((i) => [...chainIdFor(i)])).toEqual([
      [0x12, 0x34],
      [0x13, 0x35],
      [0x14, 0x36],
      [0x18, 0x3a],
      [0x19, 0x3b],
    ]);
  });
});

describe("parseRunConfig", () => {
  it("fills defaults", () => {
    expect(defaultRunConfig()).toEqual({
      host: "localhost",
      port: 8080,
      clients: 3,
      voteStrategy: "commit",
      overrides: {},
      sendTx: false,
      txCount: 1,
      durationMs: 30_000,
      staggerMs: 500,
      joinTimeoutMs: 2_000,
      readTimeoutMs: 1_000,
    });
  });

  it("resolves overrides by id, then by index", () => {
    const config = parseRunConfig({ clients: 3, overrides: { "1": "abort", "sequencer-C": "delay" } });
    expect([0, 1, 2].map((i) => strategyFor(config, i))).toEqual(["commit", "abort", "delay"]);

    const both = parseRunConfig({ clients: 2, overrides: { "1": "abort", "sequencer-B": "random" } });
    expect(strategyFor(both, 1)).toBe("random");
  });

  it("rejects an override for a participant that does not exist", () => {
    expect(() => parseRunConfig({ clients: 2, overrides: { "sequencer-C": "abort" } })).toThrowError(
      new ConfigError(["overrides.sequencer-C: no such participant among 2"]),
    );
  });

  it.each([
    [{ clients: 0 }, "clients"],
    [{ clients: 65 }, "clients"],
    [{ port: 70_000 }, "port"],
    [{ voteStrategy: "maybe" }, "voteStrategy"],
    [{ txCount: 1.5 }, "txCount"],
  ])("rejects %o", (input, field) => {
    try {
      parseRunConfig(input);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.issues[0].startsWith(`${field}: `)).toBe(true);
    }
  });
});

describe("scenarios", () => {
  it("every preset is a valid configuration", () => {
    for (const name of SCENARIO_NAMES) {
      expect(parseRunConfig(SCENARIOS[name].config).sendTx).toBe(true);
    }
  });

  it("recognises preset names", () => {
    expect(isScenarioName("timeout-test")).toBe(true);
    expect(isScenarioName("toString")).toBe(false);
  });
});

describe("parseOverrides", () => {
  it("splits participant=strategy pairs", () => {
    expect(parseOverrides(["sequencer-B=abort", "2=delay"])).toEqual({ "sequencer-B": "abort", "2": "delay" });
  });

  it("rejects pairs without both halves", () => {
    expect(() => parseOverrides(["sequencer-B", "=abort", "x="])).toThrowError(
      new ConfigError([
        'override "sequencer-B": expected <participant>=<strategy>',
        'override "=abort": expected <participant>=<strategy>',
        'override "x=": expected <participant>=<strategy>',
      ]),
    );
  });
});

describe("parseCli", () => {
  it("starts from a scenario preset and converts seconds", async () => {
    const { scenario, config, logLevel } = await parseCli(["stress-test", "--duration", "2"], {});
    expect(scenario).toBe("stress-test");
    expect(config).toMatchObject({ clients: 5, voteStrategy: "random", sendTx: true, txCount: 5, durationMs: 2000 });
    expect(logLevel).toBe("info");
  });

  it("lets explicit flags win over the preset", async () => {
    const { config } = await parseCli(["happy-path", "--vote-strategy", "abort", "--tx-count", "4", "--stagger", "0.25"], {});
    expect(config).toMatchObject({ voteStrategy: "abort", txCount: 4, staggerMs: 250, sendTx: true });
  });

  it("collects repeated overrides", async () => {
    const { config } = await parseCli(
      ["--clients", "3", "--override", "sequencer-B=abort", "--override", "sequencer-C=delay"],
      {},
    );
    expect(config.overrides).toEqual({ "sequencer-B": "abort", "sequencer-C": "delay" });
    expect(config.sendTx).toBe(false);
  });

  it("takes the log level from the environment unless given", async () => {
    expect((await parseCli([], { LOG_LEVEL: "debug" })).logLevel).toBe("debug");
    expect((await parseCli(["--log-level", "warn"], { LOG_LEVEL: "debug" })).logLevel).toBe("warn");
    expect((await parseCli([], { LOG_LEVEL: "loud" })).logLevel).toBe("info");
  });

  it("fails on an unknown scenario", async () => {
    await expect(parseCli(["no-such-scenario"], {})).rejects.toBeInstanceOf(ConfigError);
  });
});
