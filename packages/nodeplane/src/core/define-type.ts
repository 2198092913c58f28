import { SchemaError } from "../errors/index";
import { type FieldDef, TYPE_DEF_BRAND, type TypeDef } from "./types";

// ============================================================
// Reserved Keys
// ============================================================

/**
 * Field names maintained by the store on every node.
 */
export const SYSTEM_FIELDS = ["id", "createdAt", "updatedAt"] as const;

const RESERVED_FIELD_NAMES = new Set<string>(SYSTEM_FIELDS);

// ============================================================
// Type Factory Options
// ============================================================

/**
 * Options for defining a type.
 */
export type DefineTypeOptions<F extends Readonly<Record<string, FieldDef>>> =
  Readonly<{
    /** Declared fields, in order */
    fields: F;
    /** Plural used in operation names (default: derived from the name) */
    plural?: string;
    /** Optional description for documentation */
    description?: string;
  }>;

// ============================================================
// Type Factory
// ============================================================

function validateFieldNames(
  fields: Readonly<Record<string, FieldDef>>,
  name: string,
): void {
  const conflicts = Object.keys(fields).filter((key) =>
    RESERVED_FIELD_NAMES.has(key),
  );
  if (conflicts.length > 0) {
    throw new SchemaError(
      `Type "${name}" declares reserved field names: ${conflicts.join(", ")}`,
      { type: name, conflicts, reservedKeys: [...RESERVED_FIELD_NAMES] },
      {
        suggestion: `Rename the conflicting fields. Reserved names (id, createdAt, updatedAt) are added automatically to all types.`,
      },
    );
  }
}

/**
 * Creates a type definition.
 *
 * @example
 * ```typescript
 * const Post = defineType("Post", {
 *   fields: {
 *     title: scalar("String", { required: true }),
 *     published: scalar("Boolean", { default: false }),
 *     author: relation("User", { required: true }),
 *   },
 * });
 * ```
 */
export function defineType<
  K extends string,
  F extends Readonly<Record<string, FieldDef>>,
>(name: K, options: DefineTypeOptions<F>): TypeDef<K, F> {
  validateFieldNames(options.fields, name);

  return Object.freeze({
    [TYPE_DEF_BRAND]: true as const,
    name,
    fields: options.fields,
    plural: options.plural,
    description: options.description,
  });
}
