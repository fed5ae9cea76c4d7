import path from "node:path";
import type { ProjectRecord } from "./types.ts";
import { createFileCatalogStore } from "./catalog.ts";
import { loadConfigOrDefault } from "./config.ts";
import { DisplayModel } from "./display-model.ts";
import { createLauncher } from "./launcher.ts";
import { expandHome, resolveHomeDir } from "./paths.ts";
import { buildProjection, HEADER_ICON } from "./projection.ts";
import { computeColumnLayout } from "./layout.ts";
import { runDashboardTui } from "./ui/tui.ts";

type CliOptions = {
  help: boolean;
  list: boolean;
  file?: string;
};

function usage(): string {
  return [
    "launchdeck (deck) - launch project commands on WSL and Windows",
    "",
    "Usage:",
    "  deck                           Open the dashboard",
    "  deck --list                    Print the catalog grouped by category",
    "",
    "Options:",
    "  -f, --file <path>              Use another catalog file",
    "  -l, --list                     Print the catalog and exit",
    "  -h, --help                     Show help",
    "",
    "Dashboard keys:",
    "  space/enter launch · e edit · n/a add · d delete · r refresh · o open link · ←→ scroll · q quit",
    "",
  ].join("\n");
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false, list: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (arg === "-l" || arg === "--list") {
      opts.list = true;
      continue;
    }
    if (arg === "-f" || arg === "--file") {
      const value = argv[i + 1];
      if (!value) throw new Error(`${arg} requires a value`);
      opts.file = value;
      i++;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  return opts;
}

/** Plain-text rendering of the grouped catalog, one line per row. */
export function formatCatalogListing(records: readonly ProjectRecord[]): string {
  if (!records.length) return "(no projects)\n";

  // Every column, regardless of terminal width.
  const layout = computeColumnLayout(Number.MAX_SAFE_INTEGER, 0, 0);
  const lines = buildProjection(records, layout).rows.map((row) => {
    if (row.kind === "header") return `${HEADER_ICON} ${row.category}`;
    const [name, projectPath, command, , link] = row.cells;
    const suffix = link ? `  ${link}` : "";
    return `  ${name ?? ""}  ${projectPath ?? ""}  ${command ?? ""}${suffix}`;
  });
  return lines.join("\n") + "\n";
}

export async function main(argv: string[]): Promise<number> {
  const opts = parseArgs(argv);
  if (opts.help) {
    process.stdout.write(usage());
    return 0;
  }

  const home = resolveHomeDir();
  const config = loadConfigOrDefault(home);
  const catalogPath = opts.file ? path.resolve(expandHome(opts.file, home)) : config.catalogPath;
  const store = createFileCatalogStore(catalogPath);

  if (opts.list) {
    process.stdout.write(formatCatalogListing(store.load()));
    return 0;
  }

  const model = new DisplayModel(store);
  const launcher = createLauncher({
    nativeShell: config.nativeShell,
    foreignShell: config.foreignShell,
    mountRoot: config.mountRoot,
    opener: config.opener,
  });
  await runDashboardTui({ model, launcher, statusMs: config.statusMs, catalogPath });
  return 0;
}
