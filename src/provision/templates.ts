import type { ProvisionConfig } from "./config.js";

export function renderEnvFile(config: ProvisionConfig): string {
  return `# Port
PORT=${config.gatewayPort}

# Primary provider
PRIMARY_PROVIDER=${config.primaryProvider}
PRIMARY_MODEL=${config.primaryModel}
ZAI_API_KEY=${config.zaiApiKey}

# Fallback provider
FALLBACK_PROVIDER=${config.fallbackProvider}
FALLBACK_MODELS=${config.fallbackModels.join(",")}
OPENROUTER_API_KEY=${config.openrouterApiKey}

LOG_LEVEL=${config.logLevel}
`;
}

export function renderSystemdUnit(config: ProvisionConfig): string {
  return `[Unit]
Description=OpenClaw AI Gateway
After=network.target

[Service]
Type=simple
User=${config.user}
WorkingDirectory=${config.installDir}
ExecStart=/usr/bin/npm start
Restart=on-failure
RestartSec=5
EnvironmentFile=${config.installDir}/.env

[Install]
WantedBy=multi-user.target
`;
}

export function renderSudoersDropIn(user: string): string {
  return `${user} ALL=(ALL) NOPASSWD:ALL\n`;
}
