import path from "node:path";
import { z } from "zod";

export const DEFAULT_REPO_URL = "https://github.com/mortalezz/openclaw.git";

export class MissingSecretError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`${variable} is not set.\nRun: export ${variable}="your-key"`);
    this.name = "MissingSecretError";
    this.variable = variable;
  }
}

export class ProvisionConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ProvisionConfigError";
    this.issues = issues;
  }
}

export type HostPaths = {
  markerFile: string;
  rebootRequiredFile: string;
  systemdDir: string;
  sudoersDir: string;
  rootSshDir: string;
  homeRoot: string;
};

export const DEFAULT_HOST_PATHS: HostPaths = {
  markerFile: "/tmp/.openclaw-setup-rebooted",
  rebootRequiredFile: "/var/run/reboot-required",
  systemdDir: "/etc/systemd/system",
  sudoersDir: "/etc/sudoers.d",
  rootSshDir: "/root/.ssh",
  homeRoot: "/home",
};

// Overrides arrive as raw CLI strings; the environment only carries the secrets.
export type ConfigOverrides = {
  port?: string;
  user?: string;
  dir?: string;
  repo?: string;
  serviceName?: string;
  primaryModel?: string;
  fallbackModels?: string;
  logLevel?: string;
};

const OVERRIDE_FLAGS: Array<[keyof ConfigOverrides, string]> = [
  ["port", "--port"],
  ["user", "--user"],
  ["dir", "--dir"],
  ["repo", "--repo"],
  ["serviceName", "--service-name"],
  ["primaryModel", "--primary-model"],
  ["fallbackModels", "--fallback-models"],
  ["logLevel", "--log-level"],
];

export function pickOverrides(opts: Record<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [key] of OVERRIDE_FLAGS) {
    const value = opts[key];
    if (value !== undefined) overrides[key] = String(value);
  }
  return overrides;
}

// The resumed run must see the same flags; secrets travel separately as env assignments.
export function overridesToArgv(overrides: ConfigOverrides): string[] {
  const argv: string[] = [];
  for (const [key, flag] of OVERRIDE_FLAGS) {
    const value = overrides[key];
    if (value !== undefined) argv.push(flag, value);
  }
  return argv;
}

function parseCsv(value: unknown): string[] {
  return String(value || "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

const SINGLE_LINE = /^[^\r\n]*$/;

const configSchema = z.object({
  primaryProvider: z.string().min(1).default("z.ai"),
  primaryModel: z.string().min(1).default("glm4.7"),
  fallbackProvider: z.string().min(1).default("openrouter"),
  fallbackModels: z
    .array(z.string().min(1))
    .min(1)
    .default(["google/gemini-2.5-flash", "moonshotai/kimi-k2.5"]),
  zaiApiKey: z.string().min(1).regex(SINGLE_LINE, "must not contain line breaks"),
  openrouterApiKey: z.string().min(1).regex(SINGLE_LINE, "must not contain line breaks"),
  user: z
    .string()
    .regex(/^[a-z_][a-z0-9_-]{0,31}$/, "user must be a valid login name")
    .default("openclaw"),
  installDir: z
    .string()
    .refine((value) => path.isAbsolute(value), "installDir must be an absolute path")
    .refine((value) => SINGLE_LINE.test(value), "must not contain line breaks")
    .optional(),
  gatewayPort: z.coerce.number().int().min(1).max(65_535).default(18789),
  repoUrl: z.string().min(1).default(DEFAULT_REPO_URL),
  serviceName: z
    .string()
    .regex(/^[A-Za-z0-9@._-]+$/, "serviceName must be a valid systemd unit name")
    .default("openclaw"),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
});

export type ProvisionConfig = Omit<z.infer<typeof configSchema>, "installDir"> & {
  installDir: string;
};

export function loadProvisionConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
): ProvisionConfig {
  const zaiApiKey = String(env.ZAI_API_KEY || "").trim();
  if (!zaiApiKey) {
    throw new MissingSecretError("ZAI_API_KEY");
  }
  const openrouterApiKey = String(env.OPENROUTER_API_KEY || "").trim();
  if (!openrouterApiKey) {
    throw new MissingSecretError("OPENROUTER_API_KEY");
  }

  const parsed = configSchema.safeParse({
    zaiApiKey,
    openrouterApiKey,
    primaryModel: overrides.primaryModel,
    fallbackModels: overrides.fallbackModels === undefined ? undefined : parseCsv(overrides.fallbackModels),
    user: overrides.user,
    installDir: overrides.dir,
    gatewayPort: overrides.port,
    repoUrl: overrides.repo,
    serviceName: overrides.serviceName,
    logLevel: overrides.logLevel,
  });
  if (!parsed.success) {
    throw new ProvisionConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }

  const { installDir, ...rest } = parsed.data;
  return {
    ...rest,
    installDir: installDir ?? path.posix.join("/home", rest.user, "openclaw"),
  };
}
