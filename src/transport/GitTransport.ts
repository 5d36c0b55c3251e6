import fs from "fs/promises";
import path from "path";
import { RepoClientError, errorMessage } from "../errors.js";
import {
  decodeOutput,
  gitEnv,
  runGit,
  runGitChecked,
  type RunOptions,
} from "../git/core.js";
import {
  DEFAULT_HOST,
  buildReference,
  parseReference,
  referenceForms,
  type RepoReference,
} from "../git/resolution/RepoReference.js";
import { remoteWithCredentials, type RemoteInfo } from "../git/utils/remoteUtils.js";
import { createLogger, type Logger } from "../logger.js";
import { withTempDir } from "../util/tempDirManager.js";
import type {
  CloneOptions,
  RepoMetadata,
  RepoTransport,
  TransportContext,
} from "./RepoTransport.js";

const RAW_CONTENT_BASE = "https://raw.githubusercontent.com";

export function parseSymrefHead(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/.exec(line.trim());
    if (match) return match[1] ?? null;
  }
  return null;
}

export function checkoutPath(dir: string, relativePath: string): string {
  const target = path.resolve(dir, relativePath);
  const relative = path.relative(dir, target);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new RepoClientError("invalid_argument", `Path escapes the checkout: ${relativePath}`);
  }
  return target;
}

/**
 * Plain git over a remote URL. Metadata comes from the reference itself plus
 * `git ls-remote`; single files come from a shallow sparse checkout.
 */
abstract class GitTransport implements RepoTransport {
  abstract readonly kind: "ssh" | "https";
  protected abstract readonly logger: Logger;

  constructor(protected readonly ctx: TransportContext) {}

  protected abstract remoteInfo(reference: RepoReference): RemoteInfo;

  protected gitOptions(cwd?: string): RunOptions {
    return {
      cwd,
      env: gitEnv(this.ctx.config),
      timeoutMs: this.ctx.config.commandTimeoutMs,
    };
  }

  async resolveMetadata(url: string, branchOverride: string | null): Promise<RepoMetadata> {
    const reference = parseReference(url);
    const { bareName } = referenceForms(reference);
    const branch = branchOverride ?? (await this.detectDefaultBranch(reference));
    return { fullName: bareName, branch };
  }

  async detectDefaultBranch(reference: RepoReference): Promise<string | null> {
    const remote = this.remoteInfo(reference);
    const result = await runGit(
      this.ctx.runner,
      ["ls-remote", "--symref", remote.remote, "HEAD"],
      this.gitOptions(),
    );
    if (result.exitCode !== 0) {
      this.logger.debug("Failed to detect remote default branch via ls-remote", {
        remote: remote.sanitized,
        stderr: decodeOutput(result.stderr),
      });
      return null;
    }
    return parseSymrefHead(result.stdout.toString("utf8"));
  }

  async clone(reference: RepoReference, dest: string, options: CloneOptions): Promise<boolean> {
    const remote = this.remoteInfo(reference);
    const args = ["clone", ...options.cloneArgs];
    if (options.branch) args.push("--branch", options.branch);
    args.push(remote.remote, dest);

    this.logger.info("git clone", { remote: remote.sanitized, dest });
    const result = await runGit(this.ctx.runner, args, this.gitOptions());
    if (result.exitCode !== 0) {
      this.logger.error(`Error cloning repository: ${decodeOutput(result.stderr)}`, {
        remote: remote.sanitized,
      });
      return false;
    }

    if (remote.remote !== remote.sanitized) {
      const reset = await runGit(
        this.ctx.runner,
        ["remote", "set-url", "origin", remote.sanitized],
        this.gitOptions(dest),
      );
      if (reset.exitCode !== 0) {
        this.logger.warn("git set-url origin failed", {
          dest,
          stderr: decodeOutput(reset.stderr),
        });
      }
    }
    return true;
  }

  fetchFile(
    reference: RepoReference,
    branch: string | null,
    relativePath: string,
  ): Promise<Buffer | null> {
    return this.fetchFileSparse(reference, branch, relativePath);
  }

  remoteFor(owner: string, name: string): RemoteInfo {
    return this.remoteInfo(buildReference(owner, name, this.ctx.config.host));
  }

  protected async fetchFileSparse(
    reference: RepoReference,
    branch: string | null,
    relativePath: string,
  ): Promise<Buffer | null> {
    const remote = this.remoteInfo(reference);
    const { runner } = this.ctx;

    try {
      return await withTempDir(this.ctx.tempDirs, "git", async (dir) => {
        const cloneArgs = ["clone", "--filter=blob:none", "--no-checkout", "--depth=1"];
        if (branch) cloneArgs.push("--branch", branch);
        cloneArgs.push(remote.remote, dir);

        await runGitChecked(runner, cloneArgs, this.gitOptions());
        await runGitChecked(runner, ["sparse-checkout", "init", "--no-cone"], this.gitOptions(dir));
        await runGitChecked(runner, ["sparse-checkout", "set", relativePath], this.gitOptions(dir));
        await runGitChecked(runner, ["checkout"], this.gitOptions(dir));

        return await fs.readFile(checkoutPath(dir, relativePath));
      });
    } catch (e) {
      this.logger.error(`sparse-checkout failed: ${errorMessage(e).split(remote.remote).join(remote.sanitized)}`, {
        remote: remote.sanitized,
        path: relativePath,
      });
      return null;
    }
  }
}

export class SshTransport extends GitTransport {
  readonly kind = "ssh" as const;
  protected readonly logger = createLogger("SshTransport");

  protected remoteInfo(reference: RepoReference): RemoteInfo {
    const { sshUrl } = referenceForms(reference);
    return { remote: sshUrl, sanitized: sshUrl };
  }
}

export class HttpsTransport extends GitTransport {
  readonly kind = "https" as const;
  protected readonly logger = createLogger("HttpsTransport");

  protected remoteInfo(reference: RepoReference): RemoteInfo {
    return remoteWithCredentials(referenceForms(reference).httpsUrl, this.ctx.config.git.token);
  }

  /** github.com files come straight from raw.githubusercontent.com; other hosts fall back to git. */
  override async fetchFile(
    reference: RepoReference,
    branch: string | null,
    relativePath: string,
  ): Promise<Buffer | null> {
    if (reference.host !== DEFAULT_HOST) {
      return this.fetchFileSparse(reference, branch, relativePath);
    }

    const { bareName } = referenceForms(reference);
    const url = `${RAW_CONTENT_BASE}/${bareName}/${branch ?? "HEAD"}/${relativePath}`;
    const result = await this.ctx.http.get(
      url,
      rawContentHeaders(this.ctx.config.git.token),
      this.ctx.config.httpTimeoutMs,
    );
    if (!result.ok) {
      this.logger.error(`Failed to fetch ${relativePath}: ${result.error.message}`);
      return null;
    }
    if (result.response.statusCode === 200) return result.response.body;

    this.logger.warn(`Failed to fetch ${relativePath}: HTTP ${result.response.statusCode}`, { url });
    return null;
  }
}

export function rawContentHeaders(token: string): Record<string, string> {
  const headers: Record<string, string> = {};
  if (token) headers.Authorization = `Bearer ${token}`;
  return headers;
}
