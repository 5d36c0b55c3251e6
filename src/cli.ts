import path from "path";
import { cfg, TRANSPORTS, type ClientConfig, type TransportKind } from "./config.js";
import { errorMessage } from "./errors.js";
import {
  isSshForm,
  parseReference,
  referenceForms,
} from "./git/resolution/RepoReference.js";
import { GithubApi } from "./github/GithubApi.js";

export const COMMANDS = ["resolve", "fetch", "clone", "create", "push", "whoami", "orgs"] as const;
export type Command = (typeof COMMANDS)[number];

export type CliOptions = {
  command: Command;
  args: string[];
  branch?: string;
  transport?: TransportKind;
  private: boolean;
  description?: string;
  source?: string;
  message?: string;
};

export const USAGE = [
  "Usage: gh-repo-bridge <command> [options]",
  "  resolve <ref>                      print owner, name, host and URL forms",
  "  fetch <ref> <path>                 write a single file to stdout",
  "  clone <ref> [dest]                 clone the repository",
  "  create <owner/name>                create a repository (--private, --description, --source)",
  "  push <dir> <owner/name>            push the first commit of <dir> (--message)",
  "  whoami                             print the authenticated login",
  "  orgs                               list the user's organizations",
  "Options: --branch|-b <name>, --transport=cli|ssh|https",
].join("\n");

const ARITY: Record<Command, [number, number]> = {
  resolve: [1, 1],
  fetch: [2, 2],
  clone: [1, 2],
  create: [1, 1],
  push: [2, 2],
  whoami: [0, 0],
  orgs: [0, 0],
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isTransport(value: string): value is TransportKind {
  return TRANSPORTS.some((transport) => transport === value);
}

export function parseArguments(argv: string[]): CliOptions {
  const positional: string[] = [];
  const options: Omit<CliOptions, "command" | "args"> = { private: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";

    const takeValue = (flag: string): string => {
      const value = arg.includes("=") ? arg.slice(arg.indexOf("=") + 1) : argv[++i];
      if (!value) {
        throw new Error(`Missing value for ${flag}`);
      }
      return value;
    };

    if (arg === "--private") {
      options.private = true;
      continue;
    }
    if (arg === "-b" || arg === "--branch" || arg.startsWith("--branch=")) {
      options.branch = takeValue("--branch");
      continue;
    }
    if (arg === "--transport" || arg.startsWith("--transport=")) {
      const value = takeValue("--transport");
      if (!isTransport(value)) {
        throw new Error(`Unsupported transport: ${value}`);
      }
      options.transport = value;
      continue;
    }
    if (arg === "--description" || arg.startsWith("--description=")) {
      options.description = takeValue("--description");
      continue;
    }
    if (arg === "--source" || arg.startsWith("--source=")) {
      options.source = takeValue("--source");
      continue;
    }
    if (arg === "-m" || arg === "--message" || arg.startsWith("--message=")) {
      options.message = takeValue("--message");
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  const [command, ...args] = positional;
  if (!command) throw new Error(USAGE);
  if (!isCommand(command)) throw new Error(`Unknown command: ${command}\n${USAGE}`);

  const [min, max] = ARITY[command];
  if (args.length < min || args.length > max) {
    throw new Error(`Wrong number of arguments for ${command}\n${USAGE}`);
  }

  return { command, args, ...options };
}

function splitOwnerName(value: string): [string, string] {
  const slash = value.indexOf("/");
  if (slash <= 0 || slash === value.length - 1) {
    throw new Error(`Expected owner/name, got: ${value}`);
  }
  return [value.slice(0, slash), value.slice(slash + 1)];
}

export type CliIo = {
  out: (text: string | Buffer) => void;
  err: (text: string) => void;
};

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

/** Runs one command and resolves to the process exit code. */
export async function runCli(
  argv: string[] = process.argv.slice(2),
  io: CliIo = processIo,
  makeApi: (config: ClientConfig) => GithubApi = (config) => new GithubApi({ config }),
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArguments(argv);
  } catch (error) {
    io.err(`${errorMessage(error)}\n`);
    return 2;
  }

  const config: ClientConfig = options.transport ? { ...cfg, transport: options.transport } : cfg;
  const api = makeApi(config);

  switch (options.command) {
    case "resolve": {
      const [ref = ""] = options.args;
      const reference = parseReference(ref);
      const report = { ...reference, ...referenceForms(reference), ssh: isSshForm(ref) };
      io.out(`${JSON.stringify(report, null, 2)}\n`);
      return 0;
    }
    case "fetch": {
      const [ref = "", filePath = ""] = options.args;
      const repo = await api.repo(ref, options.branch);
      const data = await repo.getFileBytes(filePath);
      if (data === null) {
        io.err(`Failed to fetch ${filePath} from ${repo.fullName}\n`);
        return 1;
      }
      io.out(data);
      return 0;
    }
    case "clone": {
      const [ref = "", dest] = options.args;
      const repo = await api.repo(ref, options.branch);
      const target = path.resolve(dest ?? repo.name);
      const cloned = await repo.clone(target);
      if (cloned === null) {
        io.err(`Failed to clone ${repo.fullName}\n`);
        return 1;
      }
      io.out(`${cloned}\n`);
      return 0;
    }
    case "create": {
      const [owner, name] = splitOwnerName(options.args[0] ?? "");
      const created = await api.createRepo(owner, name, {
        private: options.private,
        description: options.description,
        source: options.source,
      });
      return created ? 0 : 1;
    }
    case "push": {
      const [dir = "", target = ""] = options.args;
      const [owner, name] = splitOwnerName(target);
      await api.pushInitialCommit(dir, owner, name, {
        branch: options.branch,
        message: options.message,
      });
      return 0;
    }
    case "whoami": {
      io.out(`${await api.getAuthenticatedUserLogin()}\n`);
      return 0;
    }
    case "orgs": {
      const orgs = await api.getUserOrgs();
      for (const org of orgs) io.out(`${org.login}\n`);
      return 0;
    }
  }
}
