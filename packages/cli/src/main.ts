#!/usr/bin/env node
/**
 * @chronostamp/cli — Entry point.
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv.slice(2));
