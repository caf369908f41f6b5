import { promises as fs } from "node:fs";

import { ConfigError, isErrnoException } from "./errors.js";
import { getConfigPaths } from "./paths.js";
import type { BackendCredential, BackendKind, BackendTarget } from "./types.js";

export interface ReviewConfigFile {
  readonly backend?: {
    readonly type?: string;
    /** Repository URL (web or clone URL); its origin becomes the backend's base URL. */
    readonly url?: string;
    readonly token?: string;
  };
  readonly base?: string;
  readonly requestTimeoutMs?: number;
  readonly maxAttempts?: number;
  readonly archivePublished?: boolean;
}

export interface ReviewSettings {
  readonly base?: string;
  readonly requestTimeoutMs: number;
  readonly maxAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly archivePublished: boolean;
}

export interface ResolvedConfig {
  /** Undefined when neither the config files nor the git remote identify the backend. */
  readonly backend?: BackendTarget;
  readonly backendProblem?: string;
  readonly token?: string;
  readonly tokenSource?: string;
  readonly settings: ReviewSettings;
}

export interface RemoteLocation {
  readonly host: string;
  readonly baseUrl: string;
  /** Owner for GitHub; full group path (possibly nested) for GitLab. */
  readonly owner: string;
  readonly repo: string;
}

export const DEFAULT_SETTINGS: ReviewSettings = {
  requestTimeoutMs: 30_000,
  maxAttempts: 4,
  retryBaseDelayMs: 500,
  archivePublished: true,
};

const TOKEN_VARIABLES: Record<BackendKind, readonly string[]> = {
  github: ["GH_REVIEW_API_TOKEN", "GITHUB_TOKEN"],
  gitlab: ["GITLAB_TOKEN"],
};

export async function loadConfigFile(repoRoot: string): Promise<ReviewConfigFile> {
  const [repoConfigPath, homeConfigPath] = getConfigPaths(repoRoot);
  const repoConfig = repoConfigPath ? await readJson(repoConfigPath) : {};
  const homeConfig = homeConfigPath ? await readJson(homeConfigPath) : {};
  return mergeConfig(homeConfig, repoConfig);
}

/**
 * Resolution order: config file, then environment variables for the token, then the git remote for the
 * backend kind and repository.
 */
export function resolveConfig(options: {
  readonly file: ReviewConfigFile;
  readonly env: NodeJS.ProcessEnv;
  readonly remoteUrl?: string;
}): ResolvedConfig {
  const { file, env, remoteUrl } = options;
  const settings = resolveSettings(file, env);

  const url = file.backend?.url ?? remoteUrl;
  if (!url) {
    return { settings, backendProblem: "No backend.url in config and no 'origin' remote to infer it from" };
  }
  let location: RemoteLocation;
  try {
    location = parseRemoteUrl(url);
  } catch (error) {
    return { settings, backendProblem: error instanceof Error ? error.message : String(error) };
  }

  const kind = file.backend?.type ? parseBackendKind(file.backend.type) : inferBackendKind(location.host);
  if (!kind) {
    return {
      settings,
      backendProblem: `Cannot tell whether ${location.host} is GitHub or GitLab; set backend.type in the config file`,
    };
  }
  const backend: BackendTarget = { kind, baseUrl: location.baseUrl, owner: location.owner, repo: location.repo };

  if (file.backend?.token) {
    return { settings, backend, token: file.backend.token, tokenSource: "config file" };
  }
  for (const variable of TOKEN_VARIABLES[kind]) {
    const token = env[variable];
    if (token) {
      return { settings, backend, token, tokenSource: variable };
    }
  }
  return { settings, backend };
}

export function requireBackend(config: ResolvedConfig): BackendTarget {
  if (!config.backend) {
    throw new ConfigError(config.backendProblem ?? "Backend is not configured");
  }
  return config.backend;
}

/** The token for `target`; fails before any request is made when it is missing or for another backend. */
export function requireCredential(config: ResolvedConfig, target: BackendTarget): BackendCredential {
  const backend = requireBackend(config);
  if (backend.kind !== target.kind || backend.baseUrl !== target.baseUrl) {
    throw new ConfigError(
      `This review targets ${target.kind} at ${target.baseUrl}, but the configuration now points at ${backend.kind} at ${backend.baseUrl}`,
    );
  }
  if (!config.token) {
    const variables = TOKEN_VARIABLES[target.kind].join(" or ");
    throw new ConfigError(`No ${target.kind} token: set backend.token in the config file or ${variables}`);
  }
  return { kind: target.kind, baseUrl: target.baseUrl, token: config.token };
}

/**
 * Accepts `git@host:owner/repo.git`, `ssh://git@host[:port]/owner/repo.git` and
 * `https://host/owner/repo[.git]`. GitLab group paths may be nested.
 */
export function parseRemoteUrl(url: string): RemoteLocation {
  const trimmed = url.trim();
  let host: string;
  let pathname: string;
  let baseUrl: string;

  const scp = trimmed.match(/^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/);
  if (!trimmed.includes("://") && scp?.[1] && scp[2]) {
    host = scp[1];
    pathname = scp[2];
    baseUrl = `https://${host}`;
  } else {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw new ConfigError(`Unsupported repository URL: ${url}`);
    }
    host = parsed.hostname;
    pathname = decodeURIComponent(parsed.pathname);
    const webProtocol = parsed.protocol === "http:" ? "http:" : "https:";
    const port = parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed.port : "";
    baseUrl = `${webProtocol}//${host}${port ? `:${port}` : ""}`;
  }

  const segments = pathname
    .replace(/\.git\/?$/, "")
    .split("/")
    .filter(Boolean);
  // GitLab web URLs carry "/-/merge_requests/..." after the project path.
  const dash = segments.indexOf("-");
  const projectSegments = dash === -1 ? segments : segments.slice(0, dash);
  const repo = projectSegments.at(-1);
  if (projectSegments.length < 2 || !repo) {
    throw new ConfigError(`Repository URL ${url} does not name an owner and a repository`);
  }
  const githubLike = inferBackendKind(host) === "github";
  // github.com/owner/repo/pull/42 style URLs: only the first two segments are the repository.
  const owner = githubLike ? (projectSegments[0] ?? "") : projectSegments.slice(0, -1).join("/");
  const name = githubLike ? (projectSegments[1] ?? repo) : repo;
  return { host, baseUrl, owner, repo: name };
}

export function inferBackendKind(host: string): BackendKind | undefined {
  const lower = host.toLowerCase();
  if (lower.includes("gitlab")) {
    return "gitlab";
  }
  if (lower.includes("github")) {
    return "github";
  }
  return undefined;
}

function parseBackendKind(value: string): BackendKind {
  const lower = value.toLowerCase();
  if (lower === "github" || lower === "gitlab") {
    return lower;
  }
  throw new ConfigError(`Invalid backend type '${value}'. Must be 'github' or 'gitlab'.`);
}

function resolveSettings(file: ReviewConfigFile, env: NodeJS.ProcessEnv): ReviewSettings {
  return {
    base: file.base,
    requestTimeoutMs: positiveInteger(env.OFFLINE_REVIEW_TIMEOUT_MS) ?? file.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
    maxAttempts: positiveInteger(env.OFFLINE_REVIEW_MAX_ATTEMPTS) ?? file.maxAttempts ?? DEFAULT_SETTINGS.maxAttempts,
    retryBaseDelayMs: DEFAULT_SETTINGS.retryBaseDelayMs,
    archivePublished: file.archivePublished ?? DEFAULT_SETTINGS.archivePublished,
  };
}

function positiveInteger(raw: string | undefined): number | undefined {
  if (!raw) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function mergeConfig(base: ReviewConfigFile, override: ReviewConfigFile): ReviewConfigFile {
  return {
    backend: {
      type: override.backend?.type ?? base.backend?.type,
      url: override.backend?.url ?? base.backend?.url,
      token: override.backend?.token ?? base.backend?.token,
    },
    base: override.base ?? base.base,
    requestTimeoutMs: override.requestTimeoutMs ?? base.requestTimeoutMs,
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    archivePublished: override.archivePublished ?? base.archivePublished,
  };
}

async function readJson(filename: string): Promise<ReviewConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filename, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filename}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validateConfigFile(data, filename);
}

export function validateConfigFile(data: unknown, filename: string): ReviewConfigFile {
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new ConfigError(`${filename} must contain a JSON object`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(data));
  const problems: string[] = [];
  const optional = <T>(key: string, check: (value: unknown) => value is T, source: Record<string, unknown> = record) => {
    const value = source[key];
    if (value === undefined) {
      return undefined;
    }
    if (!check(value)) {
      problems.push(key);
      return undefined;
    }
    return value;
  };

  let backend: ReviewConfigFile["backend"];
  const rawBackend = record.backend;
  if (rawBackend !== undefined) {
    if (!rawBackend || typeof rawBackend !== "object" || Array.isArray(rawBackend)) {
      problems.push("backend");
    } else {
      const backendRecord: Record<string, unknown> = Object.fromEntries(Object.entries(rawBackend));
      backend = {
        type: optional("type", isString, backendRecord),
        url: optional("url", isString, backendRecord),
        token: optional("token", isString, backendRecord),
      };
    }
  }
  const config: ReviewConfigFile = {
    backend,
    base: optional("base", isString),
    requestTimeoutMs: optional("requestTimeoutMs", isPositiveInteger),
    maxAttempts: optional("maxAttempts", isPositiveInteger),
    archivePublished: optional("archivePublished", isBoolean),
  };
  if (problems.length > 0) {
    throw new ConfigError(`Invalid value for ${problems.join(", ")} in ${filename}`);
  }
  return config;
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}
