#!/usr/bin/env node
import { run } from "@stricli/core";
import { buildRenameApplication } from "./cli.js";

await run(buildRenameApplication("videos"), process.argv.slice(2), { process });
