export * from "./core/types";
export * from "./core/errors";
export * from "./core/policy";
export * from "./core/participant";
export * from "./core/harness";
export * from "./core/scenarios";
export * from "./codec/varint";
export * from "./codec/message";
export * from "./codec/frame";
export { xtDigest } from "./codec/digest";
export * from "./config";
export * from "./infra/connection";
export { makeLogger, participantLogger, type LogLevel } from "./logging";
export * from "./types/brands";
