import { SchemaError } from "../errors/index";
import {
  type OperationAction,
  type OperationCatalog,
  type OperationDescriptor,
  type OperationKind,
} from "./types";

// ============================================================
// Naming
// ============================================================

const VOWELS = new Set(["a", "e", "i", "o", "u"]);
const SIBILANT_SUFFIXES = ["s", "x", "z", "ch", "sh"];

/**
 * Derives the default plural of a type name.
 *
 * @example
 * ```typescript
 * pluralize("User"); // "Users"
 * pluralize("Category"); // "Categories"
 * pluralize("Box"); // "Boxes"
 * ```
 */
export function pluralize(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith("y") && lower.length > 1) {
    const beforeY = lower.charAt(lower.length - 2);
    if (!VOWELS.has(beforeY)) {
      return `${name.slice(0, -1)}ies`;
    }
  }
  if (SIBILANT_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return `${name}es`;
  }
  return `${name}s`;
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

// ============================================================
// Catalog
// ============================================================

type CatalogEntry = Readonly<{
  action: OperationAction;
  kind: OperationKind;
  name: (type: string, plural: string) => string;
}>;

const CATALOG_ENTRIES: readonly CatalogEntry[] = [
  { action: "findUnique", kind: "query", name: (type) => lowerFirst(type) },
  { action: "findMany", kind: "query", name: (_, plural) => lowerFirst(plural) },
  {
    action: "connection",
    kind: "query",
    name: (_, plural) => `${lowerFirst(plural)}Connection`,
  },
  { action: "create", kind: "mutation", name: (type) => `create${type}` },
  { action: "update", kind: "mutation", name: (type) => `update${type}` },
  { action: "upsert", kind: "mutation", name: (type) => `upsert${type}` },
  { action: "delete", kind: "mutation", name: (type) => `delete${type}` },
  {
    action: "updateMany",
    kind: "mutation",
    name: (_, plural) => `updateMany${plural}`,
  },
  {
    action: "deleteMany",
    kind: "mutation",
    name: (_, plural) => `deleteMany${plural}`,
  },
];

/**
 * Lists the operations one type contributes to the catalog.
 */
export function describeOperations(
  type: string,
  plural: string,
): readonly OperationDescriptor[] {
  return CATALOG_ENTRIES.map((entry) => ({
    name: entry.name(type, plural),
    kind: entry.kind,
    action: entry.action,
    type,
  }));
}

/**
 * Builds the operation catalog for a set of bound types.
 *
 * @throws SchemaError when two operations would share a name
 */
export function buildCatalog(
  types: Iterable<Readonly<{ name: string; plural: string }>>,
): OperationCatalog {
  const catalog = new Map<string, OperationDescriptor>();

  for (const type of types) {
    for (const operation of describeOperations(type.name, type.plural)) {
      const existing = catalog.get(operation.name);
      if (existing !== undefined) {
        throw new SchemaError(
          `Operation "${operation.name}" of type "${type.name}" collides with the ${existing.action} operation of type "${existing.type}"`,
          { operation: operation.name, types: [existing.type, type.name] },
          {
            suggestion: `Give one of the types an explicit "plural".`,
          },
        );
      }
      catalog.set(operation.name, operation);
    }
  }

  return catalog;
}
