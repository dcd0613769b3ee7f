#!/usr/bin/env node
import { run } from "@stricli/core";
import { buildRenameApplication } from "./cli.js";

await run(buildRenameApplication("media"), process.argv.slice(2), { process });
