#!/usr/bin/env -S node --import tsx

/**
 * runstore CLI entry point
 */

import packageJson from "../package.json" with { type: "json" };
import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2), packageJson.version);
