#!/usr/bin/env node
/**
 * @collegium/demo - Interactive CLI walkthrough.
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { runWalkthrough } from "./walkthrough.js";

runWalkthrough().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
