export {
  DEFAULT_HOST,
  buildRepoUrl,
  buildSshUrl,
  ensureGitSuffix,
  fullName,
  isSshForm,
  parseReference,
  referenceForms,
  resolveReference,
  sanitizeRepoName,
  stripGitSuffix,
  toHttpsUrl,
  toSshUrl,
} from "./git/resolution/RepoReference.js";
export type {
  ReferenceResult,
  RepoReference,
  RepoReferenceForms,
} from "./git/resolution/RepoReference.js";

export { RepoClientError, isRepoClientError } from "./errors.js";
export type { RepoClientErrorCode } from "./errors.js";

export { cfg, loadConfig, TRANSPORTS } from "./config.js";
export type { ClientConfig, TransportKind } from "./config.js";

export { createCommandRunner, gitEnv } from "./git/core.js";
export type { CommandResult, CommandRunner, RunOptions } from "./git/core.js";
export { UndiciHttpClient } from "./http/HttpClient.js";
export type { HttpClient, HttpResponse, HttpResult } from "./http/HttpClient.js";
export { LocalTempDirManager, withTempDir } from "./util/tempDirManager.js";
export type { TempDirManager } from "./util/tempDirManager.js";

export { GhCli } from "./gh/GhCli.js";
export { createTransport } from "./transport/index.js";
export type { RepoTransport, RepoMetadata } from "./transport/index.js";
export { GithubApi } from "./github/GithubApi.js";
export type { CreateRepoOptions, GithubOrg, PushInitialCommitOptions } from "./github/GithubApi.js";
export { GithubRepo } from "./github/GithubRepo.js";
