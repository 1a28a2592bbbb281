#!/usr/bin/env node
/**
 * CLI entry point for the todo client.
 * @module cli
 */

import { run } from "./program.js";
import { handleError } from "./utils/index.js";

run(process.argv).catch((error: unknown) => {
  handleError(error);
});
