import {
  type DeclarableScalarType,
  type DeletePolicy,
  FIELD_BRAND,
  type RelationFieldDef,
  type ScalarFieldDef,
} from "./types";

// ============================================================
// Scalar Fields
// ============================================================

/**
 * Options for a scalar or enumeration field.
 */
export type ScalarFieldOptions = Readonly<{
  /** Field must hold a non-null value */
  required?: boolean;
  /** No two nodes of the type may share a value; makes the field a selector key */
  unique?: boolean;
  /** Value used on create when the field is omitted */
  default?: unknown;
}>;

/**
 * Declares a scalar field.
 *
 * @example
 * ```typescript
 * const User = defineType("User", {
 *   fields: {
 *     email: scalar("String", { required: true, unique: true }),
 *     age: scalar("Int"),
 *   },
 * });
 * ```
 */
export function scalar(
  type: DeclarableScalarType,
  options: ScalarFieldOptions = {},
): ScalarFieldDef {
  return Object.freeze({
    [FIELD_BRAND]: "scalar" as const,
    type,
    values: undefined,
    required: options.required ?? false,
    unique: options.unique ?? false,
    default: options.default,
  });
}

/**
 * Declares a string field restricted to a fixed set of values.
 */
export function enumeration(
  values: readonly string[],
  options: ScalarFieldOptions = {},
): ScalarFieldDef {
  return Object.freeze({
    [FIELD_BRAND]: "scalar" as const,
    type: "String" as const,
    values: Object.freeze([...values]),
    required: options.required ?? false,
    unique: options.unique ?? false,
    default: options.default,
  });
}

// ============================================================
// Relation Fields
// ============================================================

/**
 * Options for a relation field.
 */
export type RelationFieldOptions = Readonly<{
  /** Field holds any number of related nodes */
  list?: boolean;
  /** Single relation must always be linked */
  required?: boolean;
  /** Relation name pairing this field with its opposite field */
  name?: string;
  /** Policy applied to the related nodes when this node is deleted (default: SET_NULL) */
  onDelete?: DeletePolicy;
}>;

/**
 * Declares a relation field pointing at another type.
 *
 * @example
 * ```typescript
 * const User = defineType("User", {
 *   fields: {
 *     posts: relation("Post", { list: true, onDelete: "CASCADE" }),
 *   },
 * });
 *
 * const Post = defineType("Post", {
 *   fields: {
 *     author: relation("User", { required: true }),
 *   },
 * });
 * ```
 */
export function relation(
  target: string,
  options: RelationFieldOptions = {},
): RelationFieldDef {
  return Object.freeze({
    [FIELD_BRAND]: "relation" as const,
    target,
    list: options.list ?? false,
    required: options.required ?? false,
    name: options.name,
    onDelete: options.onDelete ?? "SET_NULL",
  });
}
