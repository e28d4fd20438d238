import fs from "node:fs";
import { ProvisionConfigError, type HostPaths } from "./config.js";
import { runOrThrow, shellEscape, type CommandRunner } from "../util/sh.js";

/**
 * Durable checkpoint across a reboot: a marker file says "a reboot was already
 * triggered by this run", and an `@reboot` cron line re-enters the same command
 * once the machine is back. Both are consumed on the next start.
 */
export type CheckpointState = "fresh" | "resume";

export type Crontab = {
  read(): Promise<string>;
  write(table: string): Promise<void>;
};

export function systemCrontab(runner: CommandRunner): Crontab {
  return {
    async read() {
      // `crontab -l` exits 1 when the user has no crontab yet.
      const res = await runner(["crontab", "-l"]);
      return res.code === 0 ? res.stdout : "";
    },
    async write(table: string) {
      await runOrThrow(runner, ["crontab", "-"], { input: table, label: "crontab" });
    },
  };
}

export type ResumeEntry = {
  /** Environment assignments placed before the command on the cron line. */
  env: Record<string, string>;
  command: string[];
  scriptPath: string;
};

// cron turns an unescaped `%` into a newline; a literal line break would split the entry.
export function buildResumeCronLine(entry: Pick<ResumeEntry, "env" | "command">): string {
  const multiline = [
    ...Object.entries(entry.env).filter(([, value]) => /[\r\n]/.test(value)).map(([key]) => key),
    ...entry.command.filter((arg) => /[\r\n]/.test(arg)).map((arg) => `command argument ${JSON.stringify(arg)}`),
  ];
  if (multiline.length) {
    throw new ProvisionConfigError(multiline.map((name) => `${name}: must not contain line breaks`));
  }

  const assignments = Object.entries(entry.env).map(([key, value]) => `${key}=${shellEscape(value)}`);
  return ["@reboot", ...assignments, ...entry.command.map(shellEscape)].join(" ").replace(/%/g, "\\%");
}

function referencesScript(line: string, scriptPath: string): boolean {
  return line.includes(scriptPath) || line.includes(scriptPath.replace(/%/g, "\\%"));
}

export function withoutScriptLines(table: string, scriptPath: string): string {
  const lines = table.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  const kept = lines.filter((line) => !referencesScript(line, scriptPath));
  return kept.length ? `${kept.join("\n")}\n` : "";
}

export function countScriptLines(table: string, scriptPath: string): number {
  return table.split("\n").filter((line) => referencesScript(line, scriptPath)).length;
}

export function detectCheckpoint(paths: Pick<HostPaths, "markerFile">): CheckpointState {
  return fs.existsSync(paths.markerFile) ? "resume" : "fresh";
}

export async function armResume(params: {
  paths: Pick<HostPaths, "markerFile">;
  crontab: Crontab;
  entry: ResumeEntry;
}) {
  const line = buildResumeCronLine(params.entry);
  fs.writeFileSync(params.paths.markerFile, "");
  const current = await params.crontab.read();
  const table = withoutScriptLines(current, params.entry.scriptPath);
  await params.crontab.write(`${table}${line}\n`);
}

export async function consumeResume(params: {
  paths: Pick<HostPaths, "markerFile">;
  crontab: Crontab;
  scriptPath: string;
}) {
  fs.rmSync(params.paths.markerFile, { force: true });
  const current = await params.crontab.read();
  await params.crontab.write(withoutScriptLines(current, params.scriptPath));
}

/**
 * Drops resume entries left behind by a cycle whose marker did not survive the
 * reboot (`/tmp` is cleared at boot on most distributions).
 */
export async function discardResume(params: { crontab: Crontab; scriptPath: string }): Promise<boolean> {
  const current = await params.crontab.read();
  if (countScriptLines(current, params.scriptPath) === 0) return false;
  await params.crontab.write(withoutScriptLines(current, params.scriptPath));
  return true;
}
