import chalk from "chalk";

export type Logger = {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  raw(line: string): void;
};

export const consoleLogger: Logger = {
  log: (message) => console.log(`${chalk.green("[INFO]")} ${message}`),
  info: (message) => console.log(`${chalk.cyan("[INFO]")} ${message}`),
  warn: (message) => console.log(`${chalk.yellow("[WARN]")} ${message}`),
  error: (message) => console.error(`${chalk.red("[ERROR]")} ${message}`),
  raw: (line) => console.log(line),
};

const RULE = "=".repeat(49);

export function banner(logger: Logger, title: string) {
  logger.raw("");
  logger.raw(chalk.cyan(RULE));
  logger.raw(chalk.green(`  ${title}`));
  logger.raw(chalk.cyan(RULE));
  logger.raw("");
}

export function summary(
  logger: Logger,
  params: { primaryProvider: string; primaryModel: string; fallbackProvider: string; gatewayPort: number; serviceName: string },
) {
  logger.raw("");
  logger.raw(chalk.green(RULE));
  logger.raw(chalk.green(" OpenClaw provisioning completed"));
  logger.raw(` Primary model: ${chalk.cyan(`${params.primaryProvider} (${params.primaryModel})`)}`);
  logger.raw(` Fallback: ${chalk.yellow(params.fallbackProvider)}`);
  logger.raw(` Gateway port: ${chalk.cyan(String(params.gatewayPort))}`);
  logger.raw("");
  logger.raw(" To follow the service logs:");
  logger.raw(`   journalctl -u ${params.serviceName} -f`);
  logger.raw(chalk.green(RULE));
  logger.raw("");
}
