export type ProjectRecord = {
  name: string;
  path: string;
  command: string;
  link: string; // may be empty
  category: string; // empty renders as "N/A"
};

export const FIELD_KEYS = ["name", "path", "command", "link", "category"] as const;

export type FieldKey = (typeof FIELD_KEYS)[number];

// Edit order: 0 name, 1 path, 2 command, 3 link, 4 category.
export type FieldOrdinal = 0 | 1 | 2 | 3 | 4;

export const FIELD_LABELS: Record<FieldKey, string> = {
  name: "Name",
  path: "Path",
  command: "Command",
  link: "Link",
  category: "Category",
};

export function fieldKey(field: FieldOrdinal): FieldKey {
  return FIELD_KEYS[field];
}

export function stepField(field: FieldOrdinal, step: 1 | -1): FieldOrdinal {
  const next = (field + step + FIELD_KEYS.length) % FIELD_KEYS.length;
  return toFieldOrdinal(next);
}

function toFieldOrdinal(n: number): FieldOrdinal {
  switch (n) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    default:
      return 0;
  }
}

export interface CatalogStore {
  load(): ProjectRecord[];
  save(records: readonly ProjectRecord[]): void;
}
