import path from "path";
import { z } from "zod";
import { cfg as defaultConfig, type ClientConfig } from "../config.js";
import { RepoClientError, errorMessage } from "../errors.js";
import { GhCli } from "../gh/GhCli.js";
import {
  createCommandRunner,
  decodeOutput,
  gitEnv,
  runGit,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from "../git/core.js";
import { buildRepoUrl, sanitizeRepoName } from "../git/resolution/RepoReference.js";
import { directoryExists, expandHome } from "../git/utils/fsUtils.js";
import { UndiciHttpClient, type HttpClient } from "../http/HttpClient.js";
import { createLogger } from "../logger.js";
import { createTransport, type RepoTransport } from "../transport/index.js";
import { LocalTempDirManager, type TempDirManager } from "../util/tempDirManager.js";
import { GithubRepo } from "./GithubRepo.js";

export type GithubApiOptions = {
  config?: ClientConfig;
  runner?: CommandRunner;
  http?: HttpClient;
  tempDirs?: TempDirManager;
  /** Overrides `config.transport` when supplied. */
  transport?: RepoTransport;
};

export type CreateRepoOptions = {
  private?: boolean;
  description?: string;
  source?: string;
};

export type PushInitialCommitOptions = {
  branch?: string;
  message?: string;
};

const OrgSchema = z
  .object({
    login: z.string(),
    id: z.number().optional(),
    description: z.string().nullish(),
  })
  .passthrough();

export type GithubOrg = z.infer<typeof OrgSchema>;

/**
 * Account-level GitHub operations. Repository creation, organizations and the
 * login always go through the authenticated gh CLI; file and clone access use
 * the configured transport.
 */
export class GithubApi {
  readonly config: ClientConfig;
  readonly runner: CommandRunner;
  readonly http: HttpClient;
  readonly tempDirs: TempDirManager;
  readonly gh: GhCli;
  readonly transport: RepoTransport;
  private readonly logger = createLogger("GithubApi");

  constructor(options: GithubApiOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.runner = options.runner ?? createCommandRunner({ timeoutMs: this.config.commandTimeoutMs });
    this.http = options.http ?? new UndiciHttpClient(this.config.httpTimeoutMs);
    this.tempDirs = options.tempDirs ?? new LocalTempDirManager(this.config.tempBase);
    this.gh = new GhCli(this.runner, {
      executable: this.config.gh.path,
      hostname: this.config.host,
      timeoutMs: this.config.commandTimeoutMs,
    });
    this.transport =
      options.transport ??
      createTransport(this.config.transport, {
        config: this.config,
        runner: this.runner,
        gh: this.gh,
        http: this.http,
        tempDirs: this.tempDirs,
      });
  }

  /** Opens a repository handle bound to `url`, resolving its canonical name and branch. */
  repo(url: string, branch?: string | null): Promise<GithubRepo> {
    return GithubRepo.open(this, url, branch ?? null);
  }

  async createRepo(owner: string, name: string, options: CreateRepoOptions = {}): Promise<boolean> {
    if (!owner || !name) {
      throw new RepoClientError("invalid_argument", "owner and name must be non-empty");
    }

    const nameWithOwner = `${owner}/${name}`;
    const args = ["repo", "create", nameWithOwner, options.private ? "--private" : "--public"];
    if (options.source) args.push("--source", options.source);
    if (options.description) args.push("--description", options.description);

    const result = await this.gh.run(args);
    if (result.exitCode !== 0) {
      this.logger.error(`Failed to create ${nameWithOwner}: ${decodeOutput(result.stderr)}`);
      return false;
    }
    this.logger.info(`Created repository ${nameWithOwner}.`);
    return true;
  }

  async getUserOrgs(): Promise<GithubOrg[]> {
    const result = await this.gh.run(["api", "user/orgs", "--paginate", "--jq", ".[]"]);
    if (result.exitCode !== 0) {
      this.logger.error(`Failed to fetch user organizations: ${decodeOutput(result.stderr)}`);
      return [];
    }

    const payload = decodeOutput(result.stdout);
    if (!payload) return [];

    const orgs: GithubOrg[] = [];
    for (const line of payload.split(/\r?\n/)) {
      const clean = line.trim();
      if (!clean) continue;
      try {
        orgs.push(OrgSchema.parse(JSON.parse(clean)));
      } catch (e) {
        this.logger.error(`Failed to parse organization entry: ${errorMessage(e)}`);
        return [];
      }
    }
    return orgs;
  }

  async getAuthenticatedUserLogin(): Promise<string> {
    const result = await this.gh.run(["api", "user", "--jq", ".login"]);
    if (result.exitCode !== 0) {
      throw new RepoClientError(
        "command_failed",
        `Failed to resolve authenticated user login: ${decodeOutput(result.stderr)}`,
      );
    }

    const login = decodeOutput(result.stdout);
    if (!login) {
      throw new RepoClientError(
        "command_failed",
        "GitHub CLI did not return an authenticated user login.",
      );
    }
    return login;
  }

  /** Initializes a git repository at `repoPath` and pushes its first commit. */
  async pushInitialCommit(
    repoPath: string,
    owner: string,
    name: string,
    options: PushInitialCommitOptions = {},
  ): Promise<void> {
    const branch = options.branch ?? "main";
    const message = options.message ?? "init commit";

    const remote = this.transport.remoteFor(owner, name);
    const target = path.resolve(expandHome(repoPath));
    if (!(await directoryExists(target))) {
      throw new RepoClientError("invalid_argument", `repo_path must be a directory: ${repoPath}`);
    }

    await this.gitStep(target, ["init"], "Failed to initialize git repository");
    await this.applyIdentity(target);
    await this.gitStep(target, ["add", "--all"], "Failed to stage project files");
    await this.gitStep(target, ["commit", "-m", message], "Failed to create initial commit");
    await this.gitStep(target, ["branch", "-M", branch], `Failed to set branch to ${branch}`);

    const remoteAdd = await this.git(target, ["remote", "add", "origin", remote.remote]);
    if (remoteAdd.exitCode !== 0) {
      const remoteSet = await this.git(target, ["remote", "set-url", "origin", remote.remote]);
      if (remoteSet.exitCode !== 0) {
        const detail = decodeOutput(remoteSet.stderr) || decodeOutput(remoteAdd.stderr);
        throw new RepoClientError("command_failed", `Failed to configure remote origin: ${detail}`);
      }
    }

    const push = await this.git(target, ["push", "-u", "origin", branch]);
    if (remote.remote !== remote.sanitized) {
      const reset = await this.git(target, ["remote", "set-url", "origin", remote.sanitized]);
      if (reset.exitCode !== 0) {
        this.logger.warn("git set-url origin failed", { target, stderr: decodeOutput(reset.stderr) });
      }
    }
    if (push.exitCode !== 0) {
      throw new RepoClientError(
        "command_failed",
        `Failed to push initial commit: ${decodeOutput(push.stderr)}`,
      );
    }
    this.logger.info(`Pushed initial commit to ${remote.sanitized}`, { branch });
  }

  static buildRepoUrl(owner: string, name: string): string {
    return buildRepoUrl(owner, name);
  }

  static sanitizeRepoName(name: string): string {
    return sanitizeRepoName(name);
  }

  private gitOptions(cwd: string): RunOptions {
    return { cwd, env: gitEnv(this.config), timeoutMs: this.config.commandTimeoutMs };
  }

  private git(cwd: string, args: string[]): Promise<CommandResult> {
    return runGit(this.runner, args, this.gitOptions(cwd));
  }

  private async gitStep(cwd: string, args: string[], failure: string): Promise<void> {
    const result = await this.git(cwd, args);
    if (result.exitCode !== 0) {
      throw new RepoClientError("command_failed", `${failure}: ${decodeOutput(result.stderr)}`, {
        details: { exitCode: result.exitCode },
      });
    }
  }

  private async applyIdentity(cwd: string): Promise<void> {
    const { userName, userEmail } = this.config.git;
    if (userName) await this.gitStep(cwd, ["config", "user.name", userName], "Failed to set git user.name");
    if (userEmail) await this.gitStep(cwd, ["config", "user.email", userEmail], "Failed to set git user.email");
  }
}
