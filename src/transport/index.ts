import type { TransportKind } from "../config.js";
import { CliTransport } from "./CliTransport.js";
import { HttpsTransport, SshTransport } from "./GitTransport.js";
import type { RepoTransport, TransportContext } from "./RepoTransport.js";

export type {
  CloneOptions,
  RepoMetadata,
  RepoTransport,
  TransportContext,
} from "./RepoTransport.js";
export { CliTransport } from "./CliTransport.js";
export { HttpsTransport, SshTransport, parseSymrefHead, rawContentHeaders } from "./GitTransport.js";

export function createTransport(kind: TransportKind, ctx: TransportContext): RepoTransport {
  switch (kind) {
    case "cli":
      return new CliTransport(ctx);
    case "ssh":
      return new SshTransport(ctx);
    case "https":
      return new HttpsTransport(ctx);
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown transport type: ${String(unknown)}. Supported types: cli, ssh, https`);
    }
  }
}
