/**
 * RepoReference.ts - conversions between the textual forms of a repository
 * reference: bare `owner/name`, `https://host/owner/name(.git)`,
 * `ssh://git@host/owner/name(.git)` and scp-style `git@host:owner/name(.git)`.
 *
 * Every function here is pure. Nothing logs, nothing touches the network.
 */
import { RepoClientError } from "../../errors.js";

export const DEFAULT_HOST = "github.com";

const GIT_SUFFIX = ".git";
const SCP_PREFIX = "git@";

export type RepoReference = {
  owner: string;
  name: string;
  host: string;
};

export type RepoReferenceForms = {
  bareName: string;
  httpsUrl: string;
  sshUrl: string;
};

export type ReferenceResult =
  | { ok: true; reference: RepoReference }
  | { ok: false; error: RepoClientError };

type ExtractedRemote = {
  host: string;
  path: string;
};

export function stripGitSuffix(url: string): string {
  return url.endsWith(GIT_SUFFIX) ? url.slice(0, -GIT_SUFFIX.length) : url;
}

export function ensureGitSuffix(url: string): string {
  return stripGitSuffix(url) + GIT_SUFFIX;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}

function repoPath(path: string): string {
  return trimSlashes(stripGitSuffix(trimSlashes(path)));
}

function parseUrl(value: string): URL | null {
  if (!value.includes("://")) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

// Percent-escapes are undone so URL and scp/bare forms of one path compare equal.
function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

// Splits on the first colon only; colons inside the path are not supported.
function splitScp(value: string): ExtractedRemote {
  const rest = value.slice(SCP_PREFIX.length);
  const colon = rest.indexOf(":");
  if (colon < 0) return { host: rest.toLowerCase(), path: "" };
  return {
    host: rest.slice(0, colon).toLowerCase(),
    path: trimSlashes(decodePath(rest.slice(colon + 1))),
  };
}

function extractRemote(reference: string): ExtractedRemote | null {
  const trimmed = reference.trim();
  if (trimmed.startsWith(SCP_PREFIX)) return splitScp(trimmed);

  const url = parseUrl(trimmed);
  if (url) {
    if (!url.hostname) return null;
    return { host: url.hostname.toLowerCase(), path: trimSlashes(decodePath(url.pathname)) };
  }

  if (trimmed.includes("/")) {
    return { host: DEFAULT_HOST, path: trimSlashes(decodePath(trimmed)) };
  }
  return null;
}

export function isSshForm(reference: string): boolean {
  const trimmed = reference.trim();
  if (trimmed.startsWith(SCP_PREFIX)) return true;
  return parseUrl(trimmed)?.protocol === "ssh:";
}

export function toSshUrl(reference: string): string {
  const trimmed = reference.trim();
  if (trimmed.startsWith(SCP_PREFIX)) return ensureGitSuffix(trimmed);

  const extracted = extractRemote(trimmed);
  if (extracted) {
    const path = repoPath(extracted.path);
    if (extracted.host && path) {
      return `${SCP_PREFIX}${extracted.host}:${path}${GIT_SUFFIX}`;
    }
  }
  return ensureGitSuffix(trimmed);
}

export function toHttpsUrl(reference: string): string {
  const trimmed = reference.trim();
  const extracted = extractRemote(trimmed);
  if (extracted) {
    const path = repoPath(extracted.path);
    if (extracted.host && path) {
      return `https://${extracted.host}/${path}${GIT_SUFFIX}`;
    }
  }
  return ensureGitSuffix(trimmed);
}

/** `owner/name` for any accepted form, or null when no path can be extracted. */
export function fullName(reference: string): string | null {
  const extracted = extractRemote(reference);
  if (!extracted) return null;
  const path = repoPath(extracted.path);
  return path.length ? path : null;
}

export function resolveReference(reference: string): ReferenceResult {
  const trimmed = reference.trim();
  if (!trimmed) {
    return {
      ok: false,
      error: new RepoClientError("empty_reference", "Repository reference is empty"),
    };
  }

  const invalid = (): ReferenceResult => ({
    ok: false,
    error: new RepoClientError(
      "invalid_reference",
      `Repository reference must resolve to owner/name: ${trimmed}`,
      { details: { reference: trimmed } },
    ),
  });

  const extracted = extractRemote(trimmed);
  if (!extracted || !extracted.host) return invalid();

  const path = repoPath(extracted.path);
  const slash = path.indexOf("/");
  if (slash < 0) return invalid();

  const owner = path.slice(0, slash);
  const name = path.slice(slash + 1);
  if (!owner || !name || name.includes("/")) return invalid();

  return { ok: true, reference: { owner, name, host: extracted.host } };
}

export function parseReference(reference: string): RepoReference {
  const result = resolveReference(reference);
  if (!result.ok) throw result.error;
  return result.reference;
}

export function referenceForms(reference: RepoReference): RepoReferenceForms {
  const bareName = `${reference.owner}/${reference.name}`;
  return {
    bareName,
    httpsUrl: `https://${reference.host}/${bareName}${GIT_SUFFIX}`,
    sshUrl: `${SCP_PREFIX}${reference.host}:${bareName}${GIT_SUFFIX}`,
  };
}

/** Mirrors the hosting provider: surrounding whitespace dropped, inner spaces become dashes. */
export function sanitizeRepoName(name: string): string {
  return name.trim().replace(/ /g, "-");
}

/** Reference for a repository about to be created or pushed; the name is sanitized first. */
export function buildReference(owner: string, name: string, host = DEFAULT_HOST): RepoReference {
  const cleanOwner = owner.trim();
  const sanitized = sanitizeRepoName(name);
  if (!cleanOwner || !sanitized) {
    throw new RepoClientError(
      "invalid_reference",
      "owner and name must be non-empty to build repo URL",
    );
  }
  return { owner: cleanOwner, name: sanitized, host };
}

export function buildRepoUrl(owner: string, name: string, host = DEFAULT_HOST): string {
  return referenceForms(buildReference(owner, name, host)).httpsUrl;
}

export function buildSshUrl(owner: string, name: string, host = DEFAULT_HOST): string {
  return referenceForms(buildReference(owner, name, host)).sshUrl;
}
