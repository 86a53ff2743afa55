#!/usr/bin/env node
import { Command } from "commander";

import { attachStatusCommand } from "./commands/status";
import { attachDevicesCommand } from "./commands/devices";
import { attachSubmitCommand } from "./commands/submit";
import { parsePort, parsePositiveInt } from "./util/parse";

async function main() {
  const program = new Command();

  program
    .name("devicewatch")
    .alias("dw")
    .description("devicewatch CLI: query and feed the dashboard over its HTTP API")
    .version("0.1.0")
    .option("--host <host>", "API host (default: 127.0.0.1, or DW_HOST)")
    .option("--port <port>", "API port (default: 8000, or DW_PORT)", parsePort)
    .option("--key <key>", "Access key (default: DW_ACCESS_KEY)")
    .option("--json", "Output JSON for scripting", false)
    .option("--timeout <ms>", "Request timeout in ms", parsePositiveInt)
    .option("--debug", "Enable HTTP debug logging", false);

  attachStatusCommand(program);
  attachDevicesCommand(program);
  attachSubmitCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
