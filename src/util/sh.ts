import { spawn } from "node:child_process";

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
};

export type CommandRunner = (argv: string[], opts?: RunOptions) => Promise<RunResult>;

export class CommandFailedError extends Error {
  readonly argv: string[];
  readonly code: number;

  constructor(argv: string[], result: RunResult, label?: string) {
    const prefix = label ? `${label}: ` : "";
    super(`${prefix}command failed (${result.code}): ${argv.join(" ")}\n${result.stderr || result.stdout}`);
    this.name = "CommandFailedError";
    this.argv = argv;
    this.code = result.code;
  }
}

export async function run(argv: string[], opts?: RunOptions): Promise<RunResult> {
  return await new Promise((resolve) => {
    let settled = false;
    const finish = (result: RunResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(argv[0], argv.slice(1), {
      stdio: ["pipe", "pipe", "pipe"],
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => (stdout += chunk));
    child.stderr.on("data", (chunk: string) => (stderr += chunk));

    // A child that exits without reading its input closes the pipe under us.
    child.stdin.on("error", (error) => {
      stderr ||= error.message;
    });
    if (opts?.input !== undefined) {
      child.stdin.end(opts.input);
    } else {
      child.stdin.end();
    }

    child.on("error", (error) => {
      finish({
        code: 1,
        stdout,
        stderr: stderr || (error instanceof Error ? error.message : String(error)),
      });
    });

    child.on("close", (code: number | null) => {
      finish({ code: Number(code ?? 1), stdout, stderr });
    });
  });
}

export async function runOrThrow(
  runner: CommandRunner,
  argv: string[],
  opts?: RunOptions & { label?: string },
): Promise<RunResult> {
  const res = await runner(argv, opts);
  if (res.code !== 0) {
    throw new CommandFailedError(argv, res, opts?.label);
  }
  return res;
}

export function shellEscape(value: string): string {
  return `'${String(value).replace(/'/g, `'"'"'`)}'`;
}
