import { makeLogger } from "../../src/logging";

export const silentLogger = makeLogger("silent");
