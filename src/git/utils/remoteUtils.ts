export type RemoteInfo = {
  remote: string;
  sanitized: string;
};

export function maskRemote(remote: string) {
  try {
    const url = new URL(remote);
    url.username = "";
    url.password = "";
    return `${url.protocol}//${url.host}${url.pathname}${url.search}`;
  } catch {
    return remote;
  }
}

/**
 * Embeds a token into an HTTPS remote for a single network operation.
 * `sanitized` is the form safe to persist in .git/config or print.
 */
export function remoteWithCredentials(remote: string, token: string): RemoteInfo {
  let url: URL;
  try {
    url = new URL(remote);
  } catch {
    return { remote, sanitized: remote };
  }
  if (url.protocol !== "https:") return { remote, sanitized: remote };

  const sanitized = maskRemote(remote);
  if (!token) return { remote, sanitized };

  url.username = "x-access-token";
  url.password = token;
  return { remote: url.toString(), sanitized };
}
