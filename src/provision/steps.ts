import fs from "node:fs";
import path from "node:path";
import type { HostPaths, ProvisionConfig } from "./config.js";
import { renderEnvFile, renderSudoersDropIn, renderSystemdUnit } from "./templates.js";
import type { Logger } from "../util/log.js";
import { runOrThrow, type CommandRunner } from "../util/sh.js";

export type StepContext = {
  config: ProvisionConfig;
  paths: HostPaths;
  runner: CommandRunner;
  logger: Logger;
};

export const APT_PACKAGES = [
  "curl",
  "git",
  "build-essential",
  "ufw",
  "jq",
  "unzip",
  "dbus-user-session",
  "nodejs",
  "npm",
] as const;

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

/** Returns true when the upgrade left the OS asking for a reboot. */
export async function systemUpdate(ctx: StepContext): Promise<boolean> {
  ctx.logger.log("Updating system packages...");
  await runOrThrow(ctx.runner, ["apt-get", "update", "-qq"], { env: APT_ENV, label: "apt-get update" });
  await runOrThrow(ctx.runner, ["apt-get", "upgrade", "-y", "-qq"], { env: APT_ENV, label: "apt-get upgrade" });
  return fs.existsSync(ctx.paths.rebootRequiredFile);
}

export async function installDependencies(ctx: StepContext) {
  ctx.logger.log("Installing dependencies (including dbus-user-session)...");
  await runOrThrow(ctx.runner, ["apt-get", "update", "-qq"], { env: APT_ENV, label: "apt-get update" });
  await runOrThrow(ctx.runner, ["apt-get", "install", "-y", "-qq", ...APT_PACKAGES], {
    env: APT_ENV,
    label: "apt-get install",
  });
}

/** Returns true when the account was created by this call. */
export async function setupUser(ctx: StepContext): Promise<boolean> {
  const { user } = ctx.config;
  let created = false;

  const existing = await ctx.runner(["id", "-u", user]);
  if (existing.code === 0) {
    ctx.logger.info(`User '${user}' already exists.`);
  } else {
    ctx.logger.log(`Creating user '${user}'...`);
    await runOrThrow(ctx.runner, ["useradd", "-m", "-s", "/bin/bash", user], { label: "useradd" });
    await runOrThrow(ctx.runner, ["usermod", "-aG", "sudo", user], { label: "usermod" });
    fs.mkdirSync(ctx.paths.sudoersDir, { recursive: true });
    const sudoersPath = path.join(ctx.paths.sudoersDir, user);
    fs.writeFileSync(sudoersPath, renderSudoersDropIn(user));
    fs.chmodSync(sudoersPath, 0o440);
    created = true;
  }

  await runOrThrow(ctx.runner, ["loginctl", "enable-linger", user], { label: "loginctl" });
  ctx.logger.log(`Linger enabled for ${user} (required for systemd).`);

  if (fs.existsSync(ctx.paths.rootSshDir)) {
    const sshDir = path.join(ctx.paths.homeRoot, user, ".ssh");
    const source = path.join(ctx.paths.rootSshDir, "authorized_keys");
    const target = path.join(sshDir, "authorized_keys");
    fs.mkdirSync(sshDir, { recursive: true });
    if (fs.existsSync(source)) {
      fs.copyFileSync(source, target);
    }
    await runOrThrow(ctx.runner, ["chown", "-R", `${user}:${user}`, sshDir], { label: "chown" });
    fs.chmodSync(sshDir, 0o700);
    if (fs.existsSync(target)) {
      fs.chmodSync(target, 0o600);
    }
  }

  return created;
}

export async function configureFirewall(ctx: StepContext) {
  ctx.logger.log("Configuring UFW...");
  const rules: string[][] = [
    ["--force", "reset"],
    ["default", "deny", "incoming"],
    ["default", "allow", "outgoing"],
    ["allow", "ssh"],
    ["allow", `${ctx.config.gatewayPort}/tcp`],
    ["--force", "enable"],
  ];
  for (const rule of rules) {
    await runOrThrow(ctx.runner, ["ufw", ...rule], { label: "ufw" });
  }
  ctx.logger.log(`Port ${ctx.config.gatewayPort} and SSH are open.`);
}

export async function installApplication(ctx: StepContext) {
  const { user, installDir, repoUrl } = ctx.config;
  const asUser = ["sudo", "-u", user, "-H"];

  ctx.logger.log("Cloning the OpenClaw repository...");
  if (!fs.existsSync(installDir)) {
    await runOrThrow(ctx.runner, [...asUser, "git", "clone", repoUrl, installDir], { label: "git clone" });
  }
  await runOrThrow(ctx.runner, [...asUser, "npm", "install"], { cwd: installDir, label: "npm install" });

  ctx.logger.log("Writing .env file...");
  const envPath = path.join(installDir, ".env");
  fs.writeFileSync(envPath, renderEnvFile(ctx.config), { mode: 0o600 });
  fs.chmodSync(envPath, 0o600);
  await runOrThrow(ctx.runner, ["chown", `${user}:${user}`, envPath], { label: "chown" });
}

export async function registerService(ctx: StepContext) {
  const { serviceName } = ctx.config;
  ctx.logger.log("Configuring the systemd service...");
  fs.mkdirSync(ctx.paths.systemdDir, { recursive: true });
  fs.writeFileSync(path.join(ctx.paths.systemdDir, `${serviceName}.service`), renderSystemdUnit(ctx.config));

  await runOrThrow(ctx.runner, ["systemctl", "daemon-reload"], { label: "systemctl" });
  await runOrThrow(ctx.runner, ["systemctl", "enable", serviceName], { label: "systemctl" });
  await runOrThrow(ctx.runner, ["systemctl", "restart", serviceName], { label: "systemctl" });
}
