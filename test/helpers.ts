import type { CatalogStore, ProjectRecord } from "../src/types.ts";

export function rec(fields: Partial<ProjectRecord> & { name: string }): ProjectRecord {
  return {
    path: `/home/dev/${fields.name.toLowerCase()}`,
    command: "npm start",
    link: "",
    category: "",
    ...fields,
  };
}

export type MemoryStore = CatalogStore & {
  saves: number;
  failWith: Error | null;
  contents(): ProjectRecord[];
  replace(records: ProjectRecord[]): void;
};

export function memoryStore(initial: ProjectRecord[] = []): MemoryStore {
  let saved = initial.map((r) => ({ ...r }));
  const store: MemoryStore = {
    saves: 0,
    failWith: null,
    load: () => saved.map((r) => ({ ...r })),
    save(records) {
      if (store.failWith) throw store.failWith;
      saved = records.map((r) => ({ ...r }));
      store.saves++;
    },
    contents: () => saved.map((r) => ({ ...r })),
    replace(records) {
      saved = records.map((r) => ({ ...r }));
    },
  };
  return store;
}

// Web: Zeta, Alpha; uncategorized: Beta.
export function sampleCatalog(): ProjectRecord[] {
  return [rec({ name: "Zeta", category: "Web" }), rec({ name: "Alpha", category: "Web" }), rec({ name: "Beta" })];
}
