import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createFileCatalogStore, loadCatalog, writeCatalog } from "../src/catalog.ts";
import { DisplayModel } from "../src/display-model.ts";
import { rec } from "./helpers.ts";

describe("catalog file", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "launchdeck-test-"));
    file = path.join(dir, "projects.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing file as an empty catalog", () => {
    expect(loadCatalog(file)).toEqual([]);
  });

  it("treats unparsable or non-array content as an empty catalog", () => {
    fs.writeFileSync(file, "{ not json");
    expect(loadCatalog(file)).toEqual([]);
    fs.writeFileSync(file, JSON.stringify({ name: "api" }));
    expect(loadCatalog(file)).toEqual([]);
  });

  it("fills absent fields with empty strings and drops non-objects", () => {
    fs.writeFileSync(file, JSON.stringify([{ name: "api", path: "/srv/api", command: "make run" }, 42, null, ["x"]]));
    expect(loadCatalog(file)).toEqual([{ name: "api", path: "/srv/api", command: "make run", link: "", category: "" }]);
  });

  it("writes indented JSON with a fixed key order", () => {
    writeCatalog(file, [{ category: "Web", link: "", command: "npm run dev", path: "/srv/web", name: "web" }]);
    expect(fs.readFileSync(file, "utf8")).toBe(
      [
        "[",
        "  {",
        '    "name": "web",',
        '    "path": "/srv/web",',
        '    "command": "npm run dev",',
        '    "link": "",',
        '    "category": "Web"',
        "  }",
        "]",
        "",
      ].join("\n"),
    );
    expect(fs.readdirSync(dir)).toEqual(["projects.json"]);
  });

  it("creates the parent directory", () => {
    const nested = path.join(dir, "a", "b", "projects.json");
    writeCatalog(nested, []);
    expect(loadCatalog(nested)).toEqual([]);
    expect(fs.readFileSync(nested, "utf8")).toBe("[]\n");
  });

  it("round-trips an added record through a reload", () => {
    const store = createFileCatalogStore(file);
    const model = new DisplayModel(store);
    const added = rec({ name: "Docs", path: "/mnt/c/Users/dev/docs", command: "hugo.exe", link: "http://localhost:1313", category: "Site" });
    model.addRecord(added);

    const reloaded = new DisplayModel(createFileCatalogStore(file));
    expect(reloaded.catalog).toEqual([added]);

    model.reload();
    expect(model.catalog).toEqual([added]);
  });

  it("surfaces an unwritable catalog as a save error", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const model = new DisplayModel(createFileCatalogStore(path.join(blocker, "projects.json")));
    model.addRecord(rec({ name: "api" }));
    expect(model.catalog).toHaveLength(1);
    expect(model.takeSaveError()).toBeInstanceOf(Error);
  });
});
