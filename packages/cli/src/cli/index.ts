/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export {
  parseArgs,
  parseRequestArgs,
  splitFlagString,
  type ParsedArgs,
  type RequestArgs,
} from "./parser.js";
export { runCli, collectRequests, exitCodeFor } from "./dispatcher.js";
