import { z } from "zod";
import { RepoClientError, errorMessage } from "../errors.js";
import { decodeOutput } from "../git/core.js";
import {
  buildRepoUrl,
  referenceForms,
  type RepoReference,
} from "../git/resolution/RepoReference.js";
import type { RemoteInfo } from "../git/utils/remoteUtils.js";
import { decodeContentsPayload } from "../github/contents.js";
import { createLogger } from "../logger.js";
import type {
  CloneOptions,
  RepoMetadata,
  RepoTransport,
  TransportContext,
} from "./RepoTransport.js";

const logger = createLogger("CliTransport");

const RepoViewSchema = z.object({
  name_with_owner: z.string().nullish(),
  branch: z.string().nullish(),
});

const REPO_VIEW_JQ = "{name_with_owner: .nameWithOwner, branch: .defaultBranchRef.name}";

/** Every operation goes through the authenticated `gh` CLI. */
export class CliTransport implements RepoTransport {
  readonly kind = "cli" as const;

  constructor(private readonly ctx: TransportContext) {}

  async resolveMetadata(url: string, branchOverride: string | null): Promise<RepoMetadata> {
    if (branchOverride) {
      return { fullName: await this.canonicalName(url), branch: branchOverride };
    }

    const result = await this.ctx.gh.run([
      "repo",
      "view",
      url,
      "--json",
      "nameWithOwner,defaultBranchRef",
      "--jq",
      REPO_VIEW_JQ,
    ]);
    if (result.exitCode !== 0 || !result.stdout.length) {
      logger.debug("Using fallback canonical name; gh repo view failed to return metadata.", {
        url,
        stderr: decodeOutput(result.stderr),
      });
      return { fullName: await this.canonicalName(url), branch: null };
    }

    let parsed: z.infer<typeof RepoViewSchema>;
    try {
      parsed = RepoViewSchema.parse(JSON.parse(decodeOutput(result.stdout)));
    } catch (e) {
      logger.debug("Failed to parse gh repo view output", { url, error: errorMessage(e) });
      return { fullName: await this.canonicalName(url), branch: null };
    }

    return {
      fullName: parsed.name_with_owner || (await this.canonicalName(url)),
      branch: parsed.branch || null,
    };
  }

  async clone(reference: RepoReference, dest: string, options: CloneOptions): Promise<boolean> {
    const { bareName } = referenceForms(reference);
    const args = [...options.cloneArgs];
    if (options.branch) args.push("--branch", options.branch);

    const result = await this.ctx.gh.run(["repo", "clone", bareName, dest, "--", ...args]);
    if (result.exitCode === 0) return true;

    logger.error(`Failed to clone ${bareName}: ${decodeOutput(result.stderr)}`);
    return false;
  }

  async fetchFile(
    reference: RepoReference,
    branch: string | null,
    relativePath: string,
  ): Promise<Buffer | null> {
    const { bareName } = referenceForms(reference);
    let endpoint = `repos/${bareName}/contents/${relativePath}`;
    if (branch) endpoint += `?ref=${encodeURIComponent(branch)}`;

    const result = await this.ctx.gh.run(["api", endpoint]);
    if (result.exitCode === 0) {
      return decodeContentsPayload(result.stdout, relativePath, logger);
    }

    logger.error(`Failed to fetch ${relativePath}: ${decodeOutput(result.stderr)}`);
    return null;
  }

  remoteFor(owner: string, name: string): RemoteInfo {
    const remote = buildRepoUrl(owner, name, this.ctx.config.host);
    return { remote, sanitized: remote };
  }

  private async canonicalName(url: string): Promise<string> {
    const result = await this.ctx.gh.run([
      "repo",
      "view",
      url,
      "--json",
      "nameWithOwner",
      "--jq",
      ".nameWithOwner",
    ]);
    if (result.exitCode === 0) {
      const name = decodeOutput(result.stdout);
      if (name) return name;
    }
    throw new RepoClientError(
      "invalid_reference",
      "Unable to determine canonical repository name from GitHub CLI.",
      { details: { url, stderr: decodeOutput(result.stderr) } },
    );
  }
}
