import {
  decodeOutput,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from "../git/core.js";
import { RepoClientError, isRepoClientError } from "../errors.js";
import { createLogger } from "../logger.js";
import { GH_INSTALL_GUIDE, ghLoginGuide } from "./guides.js";

const logger = createLogger("GhCli");

export type GhCliOptions = {
  /** Path or name of the gh executable. */
  executable: string;
  hostname: string;
  timeoutMs?: number;
};

/**
 * Wraps an authenticated GitHub CLI. The install/auth check runs once per
 * instance; callers own the instance and its lifetime.
 */
export class GhCli {
  private ready: Promise<string> | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: GhCliOptions,
  ) {}

  get executable(): string {
    return this.options.executable;
  }

  ensureReady(): Promise<string> {
    if (!this.ready) {
      this.ready = this.verify().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  async run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const gh = await this.ensureReady();
    return this.runner.run([gh, ...args], {
      timeoutMs: this.options.timeoutMs,
      ...options,
    });
  }

  private async verify(): Promise<string> {
    const gh = this.options.executable;
    let version: CommandResult;
    try {
      version = await this.runner.run([gh, "--version"], { timeoutMs: this.options.timeoutMs });
    } catch (error) {
      if (isRepoClientError(error, "command_not_found")) {
        throw new RepoClientError("gh_unavailable", GH_INSTALL_GUIDE, { cause: error });
      }
      throw error;
    }
    if (version.exitCode !== 0) {
      throw new RepoClientError("gh_unavailable", GH_INSTALL_GUIDE, {
        details: { stderr: decodeOutput(version.stderr) },
      });
    }

    const status = await this.runner.run(
      [gh, "auth", "status", "--hostname", this.options.hostname],
      { timeoutMs: this.options.timeoutMs },
    );
    if (status.exitCode !== 0) {
      const detail = decodeOutput(status.stderr);
      const guide = ghLoginGuide(this.options.hostname);
      throw new RepoClientError(
        "gh_unauthenticated",
        detail ? `${detail}\n\n${guide}` : guide,
      );
    }

    logger.debug("gh ready", { executable: gh, version: decodeOutput(version.stdout).split("\n")[0] });
    return gh;
  }
}
