export * from "./models";
export * from "./errors";
export * from "./crypto";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./logger";
export * from "./history/store";
export * from "./history/types";
export * from "./history/codec";
export { FileVaultBackend } from "./history/fileBackend";
export * from "./clipboard/watcher";
export * from "./clipboard/writer";
export * from "./clipboard/validate";
export { createSystemClipboard, type SystemClipboard } from "./clipboard/platform/node";
export * from "./config/schema";
export * from "./config/config";
export * from "./vault/facade";
export * from "./vault/open";
