import { RepoClientError } from "../errors.js";
import {
  resolveReference,
  type RepoReference,
} from "../git/resolution/RepoReference.js";
import { createLogger, type Logger } from "../logger.js";
import type { GithubApi } from "./GithubApi.js";

export type CloneCallbackOptions = {
  destPath?: string;
  cloneArgs?: string[];
};

const DEFAULT_CLONE_ARGS = ["--depth=1"];

function splitNameWithOwner(value: string): { owner: string; name: string } {
  const slash = value.indexOf("/");
  if (!value || slash < 0) {
    throw new RepoClientError(
      "invalid_reference",
      "Repository full name must be in 'owner/name' format.",
    );
  }
  const owner = value.slice(0, slash).trim();
  const name = value.slice(slash + 1).trim();
  if (!owner || !name) {
    throw new RepoClientError("invalid_reference", "Repository owner and name must be non-empty.");
  }
  return { owner, name };
}

/** Repository-scoped helper; obtain one through `GithubApi.repo()`. */
export class GithubRepo {
  readonly owner: string;
  readonly name: string;
  readonly reference: RepoReference;
  private readonly logger: Logger;

  private constructor(
    private readonly api: GithubApi,
    readonly url: string,
    readonly fullName: string,
    readonly branch: string | null,
    host: string,
  ) {
    const { owner, name } = splitNameWithOwner(fullName);
    this.owner = owner;
    this.name = name;
    this.reference = { owner, name, host };
    this.logger = createLogger(`GithubRepo:${fullName}`);
    this.logger.debug(`Initialized GithubRepo for repo ${fullName} on branch ${branch}.`);
  }

  static async open(api: GithubApi, url: string, branch: string | null): Promise<GithubRepo> {
    const cleanUrl = url.trim();
    if (!cleanUrl) {
      throw new RepoClientError("empty_reference", "url must not be empty");
    }

    const metadata = await api.transport.resolveMetadata(cleanUrl, branch || null);
    const parsed = resolveReference(cleanUrl);
    const host = parsed.ok ? parsed.reference.host : api.config.host;
    return new GithubRepo(api, cleanUrl, metadata.fullName, metadata.branch, host);
  }

  /** Clones into `destPath`; resolves to the path, or null when the clone failed. */
  async clone(destPath: string, cloneArgs: string[] = DEFAULT_CLONE_ARGS): Promise<string | null> {
    const ok = await this.api.transport.clone(this.reference, destPath, {
      branch: this.branch,
      cloneArgs: [...cloneArgs],
    });
    return ok ? destPath : null;
  }

  /**
   * Clones and hands the checkout to `callback`. Without `destPath` the clone
   * lives in a temp dir that is removed once the callback settles.
   */
  async withClone<T>(
    callback: (dir: string) => T | Promise<T>,
    options: CloneCallbackOptions = {},
  ): Promise<T | null> {
    const createdTemp = options.destPath === undefined;
    const target = options.destPath ?? (await this.api.tempDirs.makeDir("clone"));

    try {
      const cloned = await this.clone(target, options.cloneArgs);
      if (cloned === null) return null;
      return await callback(target);
    } finally {
      if (createdTemp) await this.api.tempDirs.cleanup(target);
    }
  }

  async getFileBytes(relativePath: string): Promise<Buffer | null> {
    const cleanPath = relativePath.trim().replace(/^\/+/, "");
    if (!cleanPath) {
      throw new RepoClientError("invalid_argument", "relative_path must not be empty");
    }
    if (cleanPath.split(/[\\/]/).includes("..")) {
      throw new RepoClientError(
        "invalid_argument",
        `relative_path must stay inside the repository: ${relativePath}`,
      );
    }
    return this.api.transport.fetchFile(this.reference, this.branch, cleanPath);
  }

  async getFile(relativePath: string, encoding: BufferEncoding = "utf8"): Promise<string | null> {
    const data = await this.getFileBytes(relativePath);
    if (data === null) return null;
    return data.toString(encoding);
  }

  cleanupTemp(dir: string): Promise<void> {
    return this.api.tempDirs.cleanup(dir);
  }
}
