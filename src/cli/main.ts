import { hideBin } from "yargs/helpers";
import { Harness } from "../core/harness";
import { ConfigError } from "../core/errors";
import { SCENARIOS, isScenarioName } from "../core/scenarios";
import { makeLogger } from "../logging";
import { parseCli } from "./options";

async function main() {
  const { scenario, config, logLevel } = await parseCli(hideBin(process.argv));
  const log = makeLogger(logLevel);
  if (scenario && isScenarioName(scenario)) {
    log.info({ scenario }, SCENARIOS[scenario].description);
  }

  const harness = new Harness(config, { logger: log });
  process.once("SIGINT", () => {
    log.warn("interrupted; stopping all clients");
    harness.stop();
  });

  const report = await harness.run();
  const failed = report.participants.filter((p) => p.outcome === "failed").length;
  log.info({ failed }, "all clients finished");
}

main().catch((e) => {
  if (e instanceof ConfigError) {
    console.error(e.message);
  } else {
    console.error("Fatal error in main:", e);
  }
  process.exit(1);
});
