import {
  DEFAULT_HOST_PATHS,
  loadProvisionConfig,
  type ConfigOverrides,
  type HostPaths,
  type ProvisionConfig,
} from "./config.js";
import {
  armResume,
  consumeResume,
  detectCheckpoint,
  discardResume,
  systemCrontab,
  type Crontab,
} from "./checkpoint.js";
import {
  configureFirewall,
  installApplication,
  installDependencies,
  registerService,
  setupUser,
  systemUpdate,
  type StepContext,
} from "./steps.js";
import { banner, consoleLogger, summary, type Logger } from "../util/log.js";
import { run, runOrThrow, type CommandRunner } from "../util/sh.js";

export const REBOOT_DELAY_MS = 3_000;

export class UnsupportedHostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedHostError";
  }
}

export type ProvisionParams = {
  env: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  /** Command the `@reboot` entry re-runs; must contain `scriptPath`. */
  resumeCommand: string[];
  scriptPath: string;
  paths?: HostPaths;
  runner?: CommandRunner;
  crontab?: Crontab;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type ProvisionOutcome =
  | { status: "rebooting" }
  | {
      status: "completed";
      resumed: boolean;
      userCreated: boolean;
      config: Pick<ProvisionConfig, "user" | "installDir" | "gatewayPort" | "serviceName">;
    };

export function outcomeReport(outcome: ProvisionOutcome): string {
  return JSON.stringify({ ok: true, ...outcome }, null, 2);
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export async function provisionServer(params: ProvisionParams): Promise<ProvisionOutcome> {
  const logger = params.logger ?? consoleLogger;
  const runner = params.runner ?? run;
  const paths = params.paths ?? DEFAULT_HOST_PATHS;
  const crontab = params.crontab ?? systemCrontab(runner);

  if (!params.resumeCommand.some((arg) => arg.includes(params.scriptPath))) {
    throw new Error(`resumeCommand must reference the script path ${params.scriptPath}`);
  }

  banner(logger, "OpenClaw setup (z.ai + OpenRouter)");

  const config = loadProvisionConfig(params.env, params.overrides);

  const apt = await runner(["sh", "-c", "command -v apt"]);
  if (apt.code !== 0) {
    throw new UnsupportedHostError("This tool only supports Ubuntu/Debian hosts (apt not found).");
  }

  const ctx: StepContext = { config, paths, runner, logger };
  const state = detectCheckpoint(paths);

  if (state === "resume") {
    logger.log("Resuming setup after reboot...");
    await consumeResume({ paths, crontab, scriptPath: params.scriptPath });
  } else {
    const rebootRequired = await systemUpdate(ctx);
    if (rebootRequired) {
      logger.warn("Kernel updated; a reboot is required.");
      await armResume({
        paths,
        crontab,
        entry: {
          env: { ZAI_API_KEY: config.zaiApiKey, OPENROUTER_API_KEY: config.openrouterApiKey },
          command: params.resumeCommand,
          scriptPath: params.scriptPath,
        },
      });
      logger.warn("API keys are stored in plaintext in root's crontab until the resumed run removes them.");
      logger.log(`Rebooting in ${REBOOT_DELAY_MS / 1000} seconds. Setup will continue automatically...`);
      await (params.sleep ?? sleep)(REBOOT_DELAY_MS);
      await runOrThrow(runner, ["reboot"], { label: "reboot" });
      return { status: "rebooting" };
    }
    if (await discardResume({ crontab, scriptPath: params.scriptPath })) {
      logger.warn("Removed a stale resume entry from root's crontab.");
    }
  }

  await installDependencies(ctx);
  const userCreated = await setupUser(ctx);
  await configureFirewall(ctx);
  await installApplication(ctx);
  await registerService(ctx);

  summary(logger, config);

  return {
    status: "completed",
    resumed: state === "resume",
    userCreated,
    config: {
      user: config.user,
      installDir: config.installDir,
      gatewayPort: config.gatewayPort,
      serviceName: config.serviceName,
    },
  };
}
