export { config } from "./config.js";
export type { EquasetsConfig, LogConfig, LogLevel, SubsetsConfig } from "./config.js";

export {
  EquaError,
  IllegalArgumentError,
  IncompatiblePathError,
  NoSuchElementError,
  UnsupportedOperationError,
} from "./errors.js";
export type { EquaErrorCode } from "./errors.js";

export { createLogger, currentLogLevel, isLevelEnabled } from "./logger.js";
export type { Logger } from "./logger.js";

export { invariant, requireArgument, unreachable } from "./safety.js";
