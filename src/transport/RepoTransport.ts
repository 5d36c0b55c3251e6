import type { ClientConfig, TransportKind } from "../config.js";
import type { GhCli } from "../gh/GhCli.js";
import type { CommandRunner } from "../git/core.js";
import type { RepoReference } from "../git/resolution/RepoReference.js";
import type { RemoteInfo } from "../git/utils/remoteUtils.js";
import type { HttpClient } from "../http/HttpClient.js";
import type { TempDirManager } from "../util/tempDirManager.js";

export type RepoMetadata = {
  fullName: string;
  branch: string | null;
};

export type CloneOptions = {
  branch: string | null;
  cloneArgs: string[];
};

export interface RepoTransport {
  readonly kind: TransportKind;

  /** Canonical `owner/name` and branch; `branchOverride` wins over the remote default. */
  resolveMetadata(url: string, branchOverride: string | null): Promise<RepoMetadata>;

  clone(reference: RepoReference, dest: string, options: CloneOptions): Promise<boolean>;

  /** File bytes, or null when the file could not be fetched. */
  fetchFile(
    reference: RepoReference,
    branch: string | null,
    relativePath: string,
  ): Promise<Buffer | null>;

  /** Remote used for `origin` when publishing a new repository. */
  remoteFor(owner: string, name: string): RemoteInfo;
}

export type TransportContext = {
  config: ClientConfig;
  runner: CommandRunner;
  gh: GhCli;
  http: HttpClient;
  tempDirs: TempDirManager;
};
