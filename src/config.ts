import "dotenv/config";
import fs from "node:fs";
import os from "node:os";
import path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { expandHome } from "./git/utils/fsUtils.js";

export const TRANSPORTS = ["cli", "ssh", "https"] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

type Env = Record<string, string | undefined>;

function homeDir(env: Env): string {
  return env.HOME || env.USERPROFILE || os.homedir();
}

function bool(v: string | undefined, def = false) {
  if (v === undefined) return def;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
}

export function parseDurationMs(value: string | undefined, fallbackMs: number) {
  if (!value) return fallbackMs;
  let s = value.toString().trim();
  if (!s.length) return fallbackMs;

  if (
    (s.startsWith("'") && s.endsWith("'")) ||
    (s.startsWith('"') && s.endsWith('"'))
  )
    s = s.slice(1, -1).trim();

  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|min|h)?$/i);
  if (!m) return fallbackMs;

  const num = Number(m[1]);
  if (!Number.isFinite(num) || num <= 0) return fallbackMs;
  const unit = (m[2] || "").toLowerCase();
  if (unit === "ms") return Math.floor(num);
  if (unit === "s") return Math.floor(num * 1000);
  if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
  if (unit === "h") return Math.floor(num * 60 * 60 * 1000);

  // Bare numbers: large values are milliseconds, small ones seconds.
  if (num > 1000) return Math.floor(num);
  return Math.floor(num * 1000);
}

const ConfigSchema = z.object({
  transport: z.enum(TRANSPORTS),
  host: z.string().min(1),
  commandTimeoutMs: z.number().int().positive(),
  httpTimeoutMs: z.number().int().positive(),
  tempBase: z.string().min(1),
  gh: z.object({
    path: z.string().min(1),
  }),
  git: z.object({
    token: z.string(),
    sshKeyPath: z.string(),
    userName: z.string(),
    userEmail: z.string(),
    defaultBranch: z.string().min(1),
  }),
  log: z.object({
    level: z.enum(LOG_LEVELS),
    console: z.boolean(),
    file: z.string(),
  }),
});

export type ClientConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = ClientConfig["log"]["level"];

const FileConfigSchema = z
  .object({
    transport: z.enum(TRANSPORTS),
    host: z.string(),
    command_timeout: z.union([z.string(), z.number()]),
    http_timeout: z.union([z.string(), z.number()]),
    temp_base: z.string(),
    gh_path: z.string(),
    git: z
      .object({
        ssh_key_path: z.string(),
        user_name: z.string(),
        user_email: z.string(),
        default_branch: z.string(),
      })
      .partial(),
    log: z
      .object({
        level: z.string(),
        console: z.boolean(),
        file: z.string(),
      })
      .partial(),
  })
  .partial();

type FileConfig = z.infer<typeof FileConfigSchema>;

export function readConfigFile(filePath: string): FileConfig {
  const contents = fs.readFileSync(filePath, "utf8");
  const parsed = FileConfigSchema.safeParse(parseYaml(contents) ?? {});
  if (!parsed.success) {
    throw new Error(
      `Invalid config file ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
    );
  }
  return parsed.data;
}

function logLevel(raw: string | undefined): LogLevel {
  const lvl = (raw || "info").toLowerCase();
  return LOG_LEVELS.find((level) => level === lvl) ?? "info";
}

function pick(...values: Array<string | number | undefined>): string | undefined {
  for (const value of values) {
    if (value === undefined) continue;
    const s = String(value).trim();
    if (s.length) return s;
  }
  return undefined;
}

/**
 * Builds the client configuration from environment variables layered over the
 * optional YAML file named by REPO_CLIENT_CONFIG. Environment values win.
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  const configPath = pick(env.REPO_CLIENT_CONFIG);
  const file: FileConfig = configPath
    ? readConfigFile(path.resolve(expandHome(configPath, homeDir(env))))
    : {};

  const sshKeyPath = pick(env.GIT_SSH_KEY_PATH, file.git?.ssh_key_path);
  const logFile = pick(env.LOG_FILE, file.log?.file);
  const tempBase = pick(env.REPO_CLIENT_TMP, file.temp_base);

  const candidate = {
    transport: (pick(env.REPO_TRANSPORT, file.transport) || "cli").toLowerCase(),
    host: pick(env.GITHUB_HOST, file.host) || "github.com",
    commandTimeoutMs: parseDurationMs(
      pick(env.COMMAND_TIMEOUT, file.command_timeout),
      15000,
    ),
    httpTimeoutMs: parseDurationMs(pick(env.HTTP_TIMEOUT, file.http_timeout), 15000),
    tempBase: tempBase ? path.resolve(expandHome(tempBase, homeDir(env))) : os.tmpdir(),
    gh: {
      path: pick(env.GH_PATH, file.gh_path) || "gh",
    },
    git: {
      token: pick(env.GITHUB_TOKEN, env.GIT_AUTH_TOKEN) || "",
      sshKeyPath: sshKeyPath ? path.resolve(expandHome(sshKeyPath, homeDir(env))) : "",
      userName: pick(env.GIT_USER_NAME, file.git?.user_name) || "",
      userEmail: pick(env.GIT_USER_EMAIL, file.git?.user_email) || "",
      defaultBranch: pick(env.GIT_DEFAULT_BRANCH, file.git?.default_branch) || "main",
    },
    log: {
      level: logLevel(pick(env.LOG_LEVEL, file.log?.level)),
      console: env.LOG_CONSOLE !== undefined ? bool(env.LOG_CONSOLE, true) : file.log?.console ?? true,
      file: logFile ? path.resolve(logFile) : "",
    },
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(
      `Invalid configuration: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
    );
  }
  return parsed.data;
}

export const cfg: ClientConfig = loadConfig();
