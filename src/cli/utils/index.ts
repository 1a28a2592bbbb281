/**
 * CLI utility exports.
 * @module cli/utils
 */

export { CLIError, ExitCode, handleError, toCLIError } from "./errors.js";
export type { ExitCode as ExitCodeType } from "./errors.js";

export {
  colorizeJson,
  formatBody,
  formatStatus,
  renderResponse,
} from "./output.js";
export type { OutputOptions } from "./output.js";
