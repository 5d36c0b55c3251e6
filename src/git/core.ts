import { execFile } from "child_process";
import type { ClientConfig } from "../config.js";
import { RepoClientError } from "../errors.js";

export type CommandResult = {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

/**
 * Executes a program and reports how it exited. A non-zero exit code is a
 * result, not an error; only spawn failures and timeouts reject.
 */
export interface CommandRunner {
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export function gitEnv(
  config: Pick<ClientConfig, "git">,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const env = { ...base };
  env.GIT_TERMINAL_PROMPT = "0";
  if (config.git.sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${config.git.sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return env;
}

export function createCommandRunner(
  defaults: { timeoutMs?: number; env?: NodeJS.ProcessEnv; maxBufferBytes?: number } = {},
): CommandRunner {
  return {
    run(argv, options = {}) {
      const [file, ...args] = argv;
      if (!file) {
        return Promise.reject(
          new RepoClientError("invalid_argument", "Command line is empty"),
        );
      }
      const timeoutMs = options.timeoutMs ?? defaults.timeoutMs ?? 0;
      const maxBuffer = defaults.maxBufferBytes ?? MAX_OUTPUT_BYTES;

      return new Promise<CommandResult>((resolve, reject) => {
        execFile(
          file,
          args,
          {
            cwd: options.cwd,
            env: options.env ?? defaults.env,
            timeout: timeoutMs,
            encoding: "buffer",
            maxBuffer,
            windowsHide: true,
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ exitCode: 0, stdout, stderr });
              return;
            }
            if (error.code === "ENOENT") {
              reject(
                new RepoClientError("command_not_found", `Executable not found: ${file}`, {
                  cause: error,
                }),
              );
              return;
            }
            if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
              reject(
                new RepoClientError(
                  "command_failed",
                  `Output of ${formatCommand(argv)} exceeded ${maxBuffer} bytes`,
                  { cause: error },
                ),
              );
              return;
            }
            if (error.killed) {
              reject(
                new RepoClientError(
                  "command_timeout",
                  `Command timed out after ${timeoutMs}ms: ${formatCommand(argv)}`,
                  { cause: error, details: { stderr: decodeOutput(stderr) } },
                ),
              );
              return;
            }
            if (typeof error.code === "number") {
              resolve({ exitCode: error.code, stdout, stderr });
              return;
            }
            reject(
              new RepoClientError("command_failed", `Failed to run ${formatCommand(argv)}: ${error.message}`, {
                cause: error,
              }),
            );
          },
        );
      });
    },
  };
}

export function decodeOutput(output: Buffer): string {
  return output.toString("utf8").trim();
}

export function formatCommand(argv: readonly string[]): string {
  return argv.join(" ");
}

export async function runGit(
  runner: CommandRunner,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  return runner.run(["git", ...args], options);
}

export async function runGitChecked(
  runner: CommandRunner,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  const result = await runGit(runner, args, options);
  if (result.exitCode !== 0) {
    const detail = decodeOutput(result.stderr);
    throw new RepoClientError(
      "command_failed",
      `Git command failed (${formatCommand(["git", ...args])}): ${detail}`,
      { details: { exitCode: result.exitCode, stderr: detail } },
    );
  }
  return result;
}
