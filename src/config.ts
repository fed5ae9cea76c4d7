import fs from "node:fs";
import path from "node:path";
import { defaultCatalogPath, expandHome, getConfigDir, legacyCatalogPath } from "./paths.ts";

export type LaunchdeckConfig = {
  catalog?: string;
  statusSeconds?: number;
  nativeShell?: string;
  foreign?: {
    mountRoot?: string;
    shell?: string;
    opener?: string[];
  };
};

export type ResolvedConfig = {
  catalogPath: string;
  statusMs: number;
  nativeShell: string;
  mountRoot: string;
  foreignShell: string;
  opener: string[];
};

export class ConfigError extends Error {
  filePath: string;
  constructor(message: string, filePath: string) {
    super(`${message}: ${filePath}`);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

const DEFAULTS = {
  statusSeconds: 3,
  nativeShell: "bash",
  mountRoot: "/mnt",
  foreignShell: "powershell.exe",
  opener: ["cmd.exe", "/c", "start"],
} as const;

export function getConfigFilePath(home: string): string {
  const override = process.env.LAUNCHDECK_CONFIG?.trim();
  if (override) return path.resolve(expandHome(override, home));
  return path.join(getConfigDir(home), "config.json");
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function parseArgsEnv(raw: string): string[] {
  const trimmed = raw.trim();
  if (!trimmed) return [];
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (isStringArray(parsed)) return parsed;
  }
  return trimmed.split(/\s+/).filter(Boolean);
}

function optionalString(obj: Record<string, unknown>, key: string, filePath: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigError(`Invalid config file ("${key}" must be a string)`, filePath);
  return value;
}

export function parseConfig(raw: string, filePath: string): LaunchdeckConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("Invalid config file (not JSON)", filePath);
  }
  if (!isObject(parsed)) throw new ConfigError("Invalid config file", filePath);

  const out: LaunchdeckConfig = {};
  out.catalog = optionalString(parsed, "catalog", filePath);
  out.nativeShell = optionalString(parsed, "nativeShell", filePath);

  if (parsed.statusSeconds !== undefined) {
    const seconds = parsed.statusSeconds;
    if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigError(`Invalid config file ("statusSeconds" must be a positive number)`, filePath);
    }
    out.statusSeconds = seconds;
  }

  if (parsed.foreign !== undefined) {
    if (!isObject(parsed.foreign)) throw new ConfigError(`Invalid config file ("foreign" must be an object)`, filePath);
    const foreign = parsed.foreign;
    let opener: string[] | undefined;
    if (foreign.opener !== undefined) {
      const raw = foreign.opener;
      if (!isStringArray(raw) || raw.length === 0) {
        throw new ConfigError(`Invalid config file ("foreign.opener" must be a non-empty string array)`, filePath);
      }
      opener = raw.slice();
    }
    out.foreign = {
      mountRoot: optionalString(foreign, "mountRoot", filePath),
      shell: optionalString(foreign, "shell", filePath),
      opener,
    };
  }
  return out;
}

export function loadConfigFile(filePath: string): LaunchdeckConfig {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat) return {};
  if (!stat.isFile()) throw new ConfigError("Config path is not a file", filePath);
  return parseConfig(fs.readFileSync(filePath, { encoding: "utf8" }), filePath);
}

/** Merges defaults, the config file and environment overrides, in that order. */
export function resolveConfig(config: LaunchdeckConfig, home: string): ResolvedConfig {
  const catalogEnv = process.env.LAUNCHDECK_CATALOG?.trim();
  const shellEnv = process.env.LAUNCHDECK_SHELL?.trim();
  const openerEnv = process.env.LAUNCHDECK_OPENER?.trim();

  const catalog = catalogEnv || config.catalog?.trim();
  const opener = openerEnv ? parseArgsEnv(openerEnv) : config.foreign?.opener;

  return {
    catalogPath: catalog ? path.resolve(expandHome(catalog, home)) : fallbackCatalogPath(home),
    statusMs: (config.statusSeconds ?? DEFAULTS.statusSeconds) * 1000,
    nativeShell: shellEnv || config.nativeShell || DEFAULTS.nativeShell,
    mountRoot: stripTrailingSlash(config.foreign?.mountRoot || DEFAULTS.mountRoot),
    foreignShell: config.foreign?.shell || DEFAULTS.foreignShell,
    opener: opener?.length ? opener : [...DEFAULTS.opener],
  };
}

function fallbackCatalogPath(home: string): string {
  const preferred = defaultCatalogPath(home);
  if (fs.existsSync(preferred)) return preferred;
  const legacy = legacyCatalogPath(home);
  return fs.existsSync(legacy) ? legacy : preferred;
}

export function loadConfigOrDefault(home: string): ResolvedConfig {
  return resolveConfig(loadConfigFile(getConfigFilePath(home)), home);
}

function stripTrailingSlash(p: string): string {
  return p.length > 1 ? p.replace(/\/+$/, "") : p;
}
