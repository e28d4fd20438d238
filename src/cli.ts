#!/usr/bin/env node
import fs from "node:fs";
import { Command } from "commander";
import { DEFAULT_HOST_PATHS, overridesToArgv, pickOverrides } from "./provision/config.js";
import { countScriptLines, detectCheckpoint, systemCrontab } from "./provision/checkpoint.js";
import { outcomeReport, provisionServer } from "./provision/server.js";
import { consoleLogger } from "./util/log.js";
import { run } from "./util/sh.js";

const program = new Command();
program.name("openclaw-provision").description("Provision a server for the OpenClaw AI gateway");

function scriptPath(): string {
  return fs.realpathSync(process.argv[1]);
}

program
  .command("provision", { isDefault: true })
  .description("Update the host, create the service account, open the firewall and install OpenClaw")
  .option("--port <port>", "Gateway port (default: 18789)")
  .option("--user <name>", "Service account (default: openclaw)")
  .option("--dir <path>", "Install directory (default: /home/<user>/openclaw)")
  .option("--repo <url>", "OpenClaw git repository")
  .option("--service-name <name>", "systemd unit name (default: openclaw)")
  .option("--primary-model <id>", "Primary z.ai model (default: glm4.7)")
  .option("--fallback-models <ids>", "Comma-separated OpenRouter fallback models")
  .option("--log-level <level>", "LOG_LEVEL written to .env (default: info)")
  .action(async (opts: Record<string, unknown>) => {
    const overrides = pickOverrides(opts);
    const script = scriptPath();
    const outcome = await provisionServer({
      env: process.env,
      overrides,
      scriptPath: script,
      resumeCommand: [process.execPath, script, "provision", ...overridesToArgv(overrides)],
    });

    // Print only non-sensitive outputs.
    console.log(outcomeReport(outcome));
  });

program
  .command("status")
  .description("Show whether a reboot-resume cycle is pending")
  .action(async () => {
    const script = scriptPath();
    const table = await systemCrontab(run).read();
    console.log(JSON.stringify({
      checkpoint: detectCheckpoint(DEFAULT_HOST_PATHS),
      markerFile: DEFAULT_HOST_PATHS.markerFile,
      resumeEntries: countScriptLines(table, script),
    }, null, 2));
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  consoleLogger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
