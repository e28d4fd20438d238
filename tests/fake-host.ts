import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { HostPaths } from "../src/provision/config.js";
import type { Crontab } from "../src/provision/checkpoint.js";
import type { Logger } from "../src/util/log.js";
import type { CommandRunner, RunOptions, RunResult } from "../src/util/sh.js";

export const SCRIPT_PATH = "/opt/openclaw-provision/dist/cli.js";
export const RESUME_COMMAND = ["/usr/bin/node", SCRIPT_PATH, "provision"];
export const TEST_ENV = { ZAI_API_KEY: "zai-test-key", OPENROUTER_API_KEY: "or-test-key" };

export type RecordedCall = { argv: string[]; opts?: RunOptions };

export type FakeHost = {
  root: string;
  paths: HostPaths;
  installDir: string;
  runner: CommandRunner;
  calls: RecordedCall[];
  crontab: Crontab & { table: string };
  logger: Logger;
  lines: string[];
  users: Set<string>;
  commands(): string[];
  cleanup(): void;
};

const ok: RunResult = { code: 0, stdout: "", stderr: "" };

export function createFakeHost(opts?: {
  failOn?: (argv: string[]) => boolean;
  aptMissing?: boolean;
}): FakeHost {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "openclaw-provision-"));
  const paths: HostPaths = {
    markerFile: path.join(root, "tmp", ".openclaw-setup-rebooted"),
    rebootRequiredFile: path.join(root, "var", "run", "reboot-required"),
    systemdDir: path.join(root, "etc", "systemd", "system"),
    sudoersDir: path.join(root, "etc", "sudoers.d"),
    rootSshDir: path.join(root, "root", ".ssh"),
    homeRoot: path.join(root, "home"),
  };
  fs.mkdirSync(path.dirname(paths.markerFile), { recursive: true });
  fs.mkdirSync(path.dirname(paths.rebootRequiredFile), { recursive: true });

  const calls: RecordedCall[] = [];
  const users = new Set<string>();
  const lines: string[] = [];

  const runner: CommandRunner = async (argv, runOpts) => {
    calls.push({ argv, opts: runOpts });
    if (opts?.failOn?.(argv)) {
      return { code: 1, stdout: "", stderr: `${argv[0]}: simulated failure` };
    }
    if (argv[0] === "sh" && argv[2] === "command -v apt") {
      return opts?.aptMissing ? { code: 1, stdout: "", stderr: "" } : { code: 0, stdout: "/usr/bin/apt\n", stderr: "" };
    }
    if (argv[0] === "id") {
      const user = argv[argv.length - 1];
      return users.has(user) ? { code: 0, stdout: "1001\n", stderr: "" } : { code: 1, stdout: "", stderr: "no such user" };
    }
    if (argv[0] === "useradd") {
      users.add(argv[argv.length - 1]);
    }
    if (argv.includes("git") && argv.includes("clone")) {
      fs.mkdirSync(argv[argv.length - 1], { recursive: true });
    }
    return ok;
  };

  const crontab = {
    table: "",
    async read() {
      return this.table;
    },
    async write(table: string) {
      this.table = table;
    },
  };

  const logger: Logger = {
    log: (message) => lines.push(`log ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    raw: () => undefined,
  };

  return {
    root,
    paths,
    installDir: path.join(root, "home", "openclaw", "openclaw"),
    runner,
    calls,
    crontab,
    logger,
    lines,
    users,
    commands: () => calls.map((call) => call.argv.join(" ")),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}
