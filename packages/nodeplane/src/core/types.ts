// ============================================================
// Brand Keys for Nominal Typing
// ============================================================

/** Brand key for TypeDef */
export const TYPE_DEF_BRAND = "__typeDef" as const;

/** Brand key for field definitions */
export const FIELD_BRAND = "__field" as const;

// ============================================================
// Scalars
// ============================================================

/**
 * Scalar kinds a field may declare. `ID` is reserved for the identity field.
 */
export type ScalarType =
  | "ID"
  | "String"
  | "Int"
  | "Float"
  | "Boolean"
  | "DateTime"
  | "Json";

/**
 * Scalar kinds available to user-declared fields.
 */
export type DeclarableScalarType = Exclude<ScalarType, "ID">;

export const DECLARABLE_SCALAR_TYPES: readonly DeclarableScalarType[] = [
  "String",
  "Int",
  "Float",
  "Boolean",
  "DateTime",
  "Json",
];

/**
 * A scalar field definition.
 */
export type ScalarFieldDef = Readonly<{
  [FIELD_BRAND]: "scalar";
  type: ScalarType;
  /** Allowed values when the field is an enumeration */
  values: readonly string[] | undefined;
  required: boolean;
  unique: boolean;
  default: unknown;
}>;

// ============================================================
// Relations
// ============================================================

/**
 * What happens to the nodes on the other side of a relation when a node
 * holding this field is deleted.
 *
 * - `CASCADE`: the related nodes are deleted too
 * - `SET_NULL`: the link is removed and the related nodes stay
 */
export type DeletePolicy = "CASCADE" | "SET_NULL";

/**
 * A relation field definition.
 */
export type RelationFieldDef = Readonly<{
  [FIELD_BRAND]: "relation";
  target: string;
  list: boolean;
  required: boolean;
  /** Explicit relation name; derived from the type names when absent */
  name: string | undefined;
  onDelete: DeletePolicy;
}>;

export type FieldDef = ScalarFieldDef | RelationFieldDef;

// ============================================================
// Type Definition
// ============================================================

/**
 * A named record kind with an ordered set of fields.
 *
 * Created via `defineType()`.
 */
export type TypeDef<
  K extends string = string,
  F extends Readonly<Record<string, FieldDef>> = Readonly<
    Record<string, FieldDef>
  >,
> = Readonly<{
  [TYPE_DEF_BRAND]: true;
  name: K;
  fields: F;
  plural: string | undefined;
  description: string | undefined;
}>;

// ============================================================
// Runtime Values
// ============================================================

/**
 * Reference to a stored node.
 */
export type NodeRef = Readonly<{
  type: string;
  id: string;
}>;

/**
 * A node as seen by callers: identity, system fields and scalar values.
 */
export type NodeSnapshot = Readonly<
  {
    id: string;
    createdAt: string;
    updatedAt: string;
  } & Record<string, unknown>
>;

// ============================================================
// Type Helpers
// ============================================================

/**
 * Checks if a value is a TypeDef.
 */
export function isTypeDef(value: unknown): value is TypeDef {
  return (
    typeof value === "object" &&
    value !== null &&
    TYPE_DEF_BRAND in value &&
    value[TYPE_DEF_BRAND] === true
  );
}

export function isRelationField(field: FieldDef): field is RelationFieldDef {
  return field[FIELD_BRAND] === "relation";
}

export function isScalarField(field: FieldDef): field is ScalarFieldDef {
  return field[FIELD_BRAND] === "scalar";
}
