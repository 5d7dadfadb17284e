// Shared infrastructure used by the router and the live route compiler.

export {
  debug,
  configureDebug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV_VAR,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export {
  toSnakeCase,
  splitIdentifier,
  concatIdentifier,
  isIdentifier,
  isHelperName,
} from "./naming.js";
