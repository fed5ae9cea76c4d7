import os from "node:os";
import path from "node:path";

export class HomeDirError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HomeDirError";
  }
}

export function resolveHomeDir(): string {
  const fromEnv = process.env.HOME?.trim();
  if (fromEnv) return fromEnv;

  let home = "";
  try {
    home = os.homedir().trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new HomeDirError(`Cannot resolve home directory: ${reason}`);
  }
  if (!home) throw new HomeDirError("Cannot resolve home directory: HOME is not set");
  return home;
}

export function expandHome(inputPath: string, home: string): string {
  if (inputPath === "~") return home;
  if (inputPath.startsWith("~/")) return path.join(home, inputPath.slice(2));
  return inputPath;
}

export function getConfigDir(home: string): string {
  const xdg = process.env.XDG_CONFIG_HOME?.trim();
  return path.join(xdg || path.join(home, ".config"), "launchdeck");
}

export function defaultCatalogPath(home: string): string {
  return path.join(getConfigDir(home), "projects.json");
}

// Where project-launcher kept its catalog; read when the new default is absent.
export function legacyCatalogPath(home: string): string {
  return path.join(home, ".local", "bin", "project-launcher.json");
}
