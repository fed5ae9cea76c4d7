export type HostTarget =
  | { kind: "native"; path: string }
  | { kind: "foreign"; windowsPath: string; drive: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Paths under `<mountRoot>/<letter>` live on the Windows side of a WSL
 * install; `/mnt/c/Users/x` becomes `C:\Users\x`.
 */
export function classifyHost(projectPath: string, mountRoot = "/mnt"): HostTarget {
  const root = mountRoot.replace(/\/+$/, "");
  const match = new RegExp(`^${escapeRegExp(root)}/([A-Za-z])(?=/|$)(.*)$`).exec(projectPath);
  if (!match) return { kind: "native", path: projectPath };

  const drive = `${(match[1] ?? "").toUpperCase()}:`;
  const rest = (match[2] ?? "").replace(/\/+/g, "\\");
  return { kind: "foreign", drive, windowsPath: rest.length ? `${drive}${rest}` : `${drive}\\` };
}

export function isWindowsExecutable(command: string): boolean {
  return /\.exe$/i.test(command.trim());
}
