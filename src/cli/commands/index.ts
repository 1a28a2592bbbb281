/**
 * CLI command exports.
 * @module cli/commands
 */

export { registerListCommand } from "./list.js";
export { registerCreateCommand } from "./create.js";
export { registerReadCommand } from "./read.js";
export { registerUpdateCommand } from "./update.js";
export { registerDeleteCommand } from "./delete.js";
