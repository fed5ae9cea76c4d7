import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "node:events";
import type { SpawnOptions } from "node:child_process";
import { classifyHost, isWindowsExecutable } from "../src/hosts.ts";
import { createLauncher, planLaunch, planOpenLink, type LauncherOptions } from "../src/launcher.ts";
import { cmdEscape, psQuote, shQuote } from "../src/shell.ts";
import { rec } from "./helpers.ts";

const options: LauncherOptions = {
  nativeShell: "bash",
  foreignShell: "powershell.exe",
  mountRoot: "/mnt",
  opener: ["cmd.exe", "/c", "start"],
};

class FakeChild extends EventEmitter {
  unref = vi.fn();
}

function fakeSpawn(result: "spawn" | Error | "throw") {
  const child = new FakeChild();
  const fn = vi.fn((_file: string, _args: string[], _options: SpawnOptions) => {
    if (result === "throw") throw new Error("EAGAIN");
    queueMicrotask(() => {
      if (result === "spawn") child.emit("spawn");
      else child.emit("error", result);
    });
    return child;
  });
  return { fn, child };
}

describe("classifyHost", () => {
  it("translates drive mounts to Windows paths", () => {
    expect(classifyHost("/mnt/c/Users/x/app")).toEqual({ kind: "foreign", drive: "C:", windowsPath: "C:\\Users\\x\\app" });
    expect(classifyHost("/mnt/d")).toEqual({ kind: "foreign", drive: "D:", windowsPath: "D:\\" });
    expect(classifyHost("/mnt/e/")).toEqual({ kind: "foreign", drive: "E:", windowsPath: "E:\\" });
  });

  it("leaves other paths on the native host", () => {
    expect(classifyHost("/home/x/api")).toEqual({ kind: "native", path: "/home/x/api" });
    expect(classifyHost("/mnt/cdrom/x")).toEqual({ kind: "native", path: "/mnt/cdrom/x" });
    expect(classifyHost("/srv/mnt/c/x")).toEqual({ kind: "native", path: "/srv/mnt/c/x" });
  });

  it("honours a custom mount root", () => {
    expect(classifyHost("/win/c/tools", "/win/")).toEqual({ kind: "foreign", drive: "C:", windowsPath: "C:\\tools" });
    expect(classifyHost("/mnt/c/tools", "/win")).toEqual({ kind: "native", path: "/mnt/c/tools" });
  });

  it("recognises Windows executables by extension", () => {
    expect(isWindowsExecutable("app.exe")).toBe(true);
    expect(isWindowsExecutable("Setup.EXE ")).toBe(true);
    expect(isWindowsExecutable("python main.py")).toBe(false);
  });
});

describe("quoting", () => {
  it("quotes for sh only when needed", () => {
    expect(shQuote("/home/x/api")).toBe("/home/x/api");
    expect(shQuote("/home/x/my app")).toBe("'/home/x/my app'");
    expect(shQuote("it's")).toBe(`'it'"'"'s'`);
  });

  it("doubles single quotes for PowerShell", () => {
    expect(psQuote("C:\\Users\\O'Brien")).toBe("'C:\\Users\\O''Brien'");
  });

  it("caret-escapes cmd.exe operators", () => {
    expect(cmdEscape("https://x.test/?a=1&b=2")).toBe("https://x.test/?a=1^&b=2");
  });
});

describe("planLaunch", () => {
  it("runs native projects through bash after changing directory", () => {
    expect(planLaunch(rec({ name: "API", path: "/home/x/api", command: "python main.py" }), options)).toEqual({
      method: "native-shell",
      file: "bash",
      args: ["-c", "cd /home/x/api && python main.py"],
      cwd: "/home/x/api",
    });
  });

  it("quotes native paths with spaces", () => {
    const plan = planLaunch(rec({ name: "Web", path: "/home/x/my web", command: "npm run dev" }), options);
    expect(plan.args).toEqual(["-c", "cd '/home/x/my web' && npm run dev"]);
  });

  it("starts Windows executables with Start-Process", () => {
    expect(planLaunch(rec({ name: "App", path: "/mnt/c/Users/x/app", command: "app.exe" }), options)).toEqual({
      method: "foreign-start-process",
      file: "powershell.exe",
      args: ["-Command", "Set-Location 'C:\\Users\\x\\app'; Start-Process 'app.exe'"],
    });
  });

  it("runs other Windows commands directly in PowerShell", () => {
    expect(planLaunch(rec({ name: "Bot", path: "/mnt/c/Users/x/bot", command: "python main.py" }), options)).toEqual({
      method: "foreign-shell",
      file: "powershell.exe",
      args: ["-Command", "Set-Location 'C:\\Users\\x\\bot'; python main.py"],
    });
  });
});

describe("launcher", () => {
  it("spawns native commands detached in their own process group", async () => {
    const { fn, child } = fakeSpawn("spawn");
    const launcher = createLauncher({ ...options, spawn: fn });
    const outcome = await launcher.launch(rec({ name: "API", path: "/home/x/api", command: "python main.py" }));

    expect(outcome).toEqual({ status: "launched", method: "native-shell", message: "🚀 Launched API" });
    expect(fn).toHaveBeenCalledWith("bash", ["-c", "cd /home/x/api && python main.py"], {
      cwd: "/home/x/api",
      detached: true,
      stdio: "ignore",
      windowsHide: true,
    });
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  it("names the Windows launch method in the message", async () => {
    const { fn } = fakeSpawn("spawn");
    const launcher = createLauncher({ ...options, spawn: fn });
    const exe = await launcher.launch(rec({ name: "App", path: "/mnt/c/Users/x/app", command: "app.exe" }));
    const script = await launcher.launch(rec({ name: "Bot", path: "/mnt/c/Users/x/bot", command: "node bot.js" }));

    expect(exe.message).toBe("🚀 Launched App (Windows via PowerShell Start-Process)");
    expect(script.message).toBe("🚀 Launched Bot (Windows via PowerShell)");
    expect(fn.mock.calls[0]?.[2]).toMatchObject({ cwd: undefined, detached: true });
  });

  it("reports spawn errors instead of throwing", async () => {
    const { fn, child } = fakeSpawn(new Error("spawn bash ENOENT"));
    const launcher = createLauncher({ ...options, spawn: fn });
    const outcome = await launcher.launch(rec({ name: "API", path: "/nope", command: "make" }));

    expect(outcome.status).toBe("failed");
    expect(outcome.message).toBe("❌ Failed to launch API: spawn bash ENOENT");
    expect(child.unref).not.toHaveBeenCalled();
  });

  it("reports a spawn call that throws", async () => {
    const { fn } = fakeSpawn("throw");
    const launcher = createLauncher({ ...options, spawn: fn });
    const outcome = await launcher.launch(rec({ name: "API" }));
    expect(outcome.message).toBe("❌ Failed to launch API: EAGAIN");
  });
});

describe("openLink", () => {
  it("spawns nothing when the record has no link", async () => {
    const { fn } = fakeSpawn("spawn");
    const launcher = createLauncher({ ...options, spawn: fn });

    expect(await launcher.openLink(rec({ name: "API" }))).toEqual({ status: "no-link", message: "📭 No link associated" });
    expect(await launcher.openLink(rec({ name: "API", link: "   " }))).toEqual({
      status: "no-link",
      message: "📭 No link associated",
    });
    expect(fn).not.toHaveBeenCalled();
  });

  it("hands the link to the Windows opener", async () => {
    const { fn } = fakeSpawn("spawn");
    const launcher = createLauncher({ ...options, spawn: fn });
    const outcome = await launcher.openLink(rec({ name: "Docs", link: "https://docs.test/?a=1&b=2" }));

    expect(outcome).toEqual({ status: "opened", message: "🌐 Opened Docs link in browser" });
    expect(fn.mock.calls[0]?.[0]).toBe("cmd.exe");
    expect(fn.mock.calls[0]?.[1]).toEqual(["/c", "start", "https://docs.test/?a=1^&b=2"]);
  });

  it("passes the link unescaped to openers other than cmd.exe", async () => {
    const { fn } = fakeSpawn("spawn");
    const launcher = createLauncher({ ...options, opener: ["xdg-open"], spawn: fn });
    await launcher.openLink(rec({ name: "Docs", link: "https://docs.test/?a=1&b=2" }));

    expect(fn.mock.calls[0]?.[0]).toBe("xdg-open");
    expect(fn.mock.calls[0]?.[1]).toEqual(["https://docs.test/?a=1&b=2"]);
  });

  it("recognises cmd.exe by full path", () => {
    expect(planOpenLink("https://x.test/?a&b", ["/mnt/c/Windows/System32/cmd.exe", "/c", "start"])).toEqual({
      file: "/mnt/c/Windows/System32/cmd.exe",
      args: ["/c", "start", "https://x.test/?a^&b"],
    });
    expect(planOpenLink("https://x.test/?a&b", ["wslview"])).toEqual({ file: "wslview", args: ["https://x.test/?a&b"] });
  });

  it("reports opener failures", async () => {
    const { fn } = fakeSpawn(new Error("spawn cmd.exe ENOENT"));
    const launcher = createLauncher({ ...options, spawn: fn });
    const outcome = await launcher.openLink(rec({ name: "Docs", link: "https://docs.test" }));
    expect(outcome.message).toBe("❌ Failed to open link: spawn cmd.exe ENOENT");
  });

  it("plans nothing without a link or an opener", () => {
    expect(planOpenLink("", ["cmd.exe"])).toBeNull();
    expect(planOpenLink("https://x.test", [])).toBeNull();
    expect(planOpenLink(" https://x.test ", ["xdg-open"])).toEqual({ file: "xdg-open", args: ["https://x.test"] });
  });
});
