import { spawn, type SpawnOptions } from "node:child_process";
import type { ProjectRecord } from "./types.ts";
import { classifyHost, isWindowsExecutable, type HostTarget } from "./hosts.ts";
import { cmdEscape, psQuote, shQuote } from "./shell.ts";

export type LaunchMethod = "native-shell" | "foreign-shell" | "foreign-start-process";

export type LaunchPlan = {
  method: LaunchMethod;
  file: string;
  args: string[];
  cwd?: string;
};

export type LaunchOutcome =
  | { status: "launched"; method: LaunchMethod; message: string }
  | { status: "opened"; message: string }
  | { status: "no-link"; message: string }
  | { status: "failed"; message: string; error: Error };

/** The part of a child process the launcher touches before letting go of it. */
export interface DetachedChild {
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnFn = (file: string, args: string[], options: SpawnOptions) => DetachedChild;

export type LauncherOptions = {
  nativeShell: string;
  foreignShell: string;
  mountRoot: string;
  opener: string[];
  spawn?: SpawnFn;
};

export type Launcher = {
  launch(record: ProjectRecord): Promise<LaunchOutcome>;
  openLink(record: ProjectRecord): Promise<LaunchOutcome>;
};

const METHOD_LABELS: Record<LaunchMethod, string> = {
  "native-shell": "",
  "foreign-shell": "Windows via PowerShell",
  "foreign-start-process": "Windows via PowerShell Start-Process",
};

function planForTarget(target: HostTarget, command: string, options: LauncherOptions): LaunchPlan {
  switch (target.kind) {
    case "native":
      return {
        method: "native-shell",
        file: options.nativeShell,
        args: ["-c", `cd ${shQuote(target.path)} && ${command}`],
        cwd: target.path,
      };
    case "foreign": {
      const location = `Set-Location ${psQuote(target.windowsPath)}`;
      // Start-Process detaches the program from the PowerShell that started it.
      if (isWindowsExecutable(command)) {
        return {
          method: "foreign-start-process",
          file: options.foreignShell,
          args: ["-Command", `${location}; Start-Process ${psQuote(command.trim())}`],
        };
      }
      return {
        method: "foreign-shell",
        file: options.foreignShell,
        args: ["-Command", `${location}; ${command}`],
      };
    }
  }
}

export function planLaunch(record: ProjectRecord, options: LauncherOptions): LaunchPlan {
  return planForTarget(classifyHost(record.path, options.mountRoot), record.command, options);
}

function isCmdShell(file: string): boolean {
  return /(^|[\\/])cmd(\.exe)?$/i.test(file);
}

// Carets are cmd.exe syntax; any other opener gets the link as typed.
export function planOpenLink(link: string, opener: string[]): { file: string; args: string[] } | null {
  const url = link.trim();
  const [file, ...rest] = opener;
  if (!url || !file) return null;
  return { file, args: [...rest, isCmdShell(file) ? cmdEscape(url) : url] };
}

/**
 * Starts the process in its own process group and forgets it: resolves once the
 * OS has created it, rejects if it could not be created.
 */
export function spawnDetached(spawnFn: SpawnFn, file: string, args: string[], cwd?: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let child: DetachedChild;
    try {
      child = spawnFn(file, args, { cwd, detached: true, stdio: "ignore", windowsHide: true });
    } catch (err) {
      reject(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createLauncher(options: LauncherOptions): Launcher {
  const spawnFn: SpawnFn = options.spawn ?? ((file, args, opts) => spawn(file, args, opts));

  return {
    async launch(record) {
      const plan = planLaunch(record, options);
      try {
        await spawnDetached(spawnFn, plan.file, plan.args, plan.cwd);
      } catch (err) {
        const error = toError(err);
        return { status: "failed", error, message: `❌ Failed to launch ${record.name}: ${error.message}` };
      }
      const via = METHOD_LABELS[plan.method];
      const message = via ? `🚀 Launched ${record.name} (${via})` : `🚀 Launched ${record.name}`;
      return { status: "launched", method: plan.method, message };
    },

    async openLink(record) {
      const plan = planOpenLink(record.link, options.opener);
      if (!plan) return { status: "no-link", message: "📭 No link associated" };
      try {
        await spawnDetached(spawnFn, plan.file, plan.args);
      } catch (err) {
        const error = toError(err);
        return { status: "failed", error, message: `❌ Failed to open link: ${error.message}` };
      }
      return { status: "opened", message: `🌐 Opened ${record.name} link in browser` };
    },
  };
}
