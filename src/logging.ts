import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export type { Logger };

export const makeLogger = (level: LogLevel = "info"): Logger =>
  level === "silent"
    ? pino({ level })
    : pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
        },
      });

/** Child logger carrying one participant's identity on every line. */
export const participantLogger = (root: Logger, participant: string, chainId: string): Logger =>
  root.child({ participant, chainId });
