import { type z } from "zod";

import { type DeletePolicy, type ScalarType } from "../core/types";

// ============================================================
// Bound Fields
// ============================================================

export type BoundScalarField = Readonly<{
  kind: "scalar";
  name: string;
  type: ScalarType;
  values: readonly string[] | undefined;
  required: boolean;
  unique: boolean;
  /** Maintained by the store (id, createdAt, updatedAt) */
  system: boolean;
}>;

/**
 * Which end of a stored link a node sits on. Every relation has an A end
 * and a B end; the A end is the field whose `Type.field` sorts first.
 */
export type RelationSide = "A" | "B";

export type BoundRelationField = Readonly<{
  kind: "relation";
  name: string;
  target: string;
  list: boolean;
  required: boolean;
  onDelete: DeletePolicy;
  relation: string;
  side: RelationSide;
  /** Opposite field on the target, if the relation is two-sided */
  opposite: Readonly<{ type: string; field: string }> | undefined;
}>;

export type BoundField = BoundScalarField | BoundRelationField;

// ============================================================
// Bound Relations
// ============================================================

export type RelationEnd = Readonly<{
  type: string;
  /** Field holding the relation on this end; undefined for one-sided relations */
  field: string | undefined;
  /** Policy applied to the other end's nodes when a node on this end is deleted */
  onDelete: DeletePolicy;
}>;

export type BoundRelation = Readonly<{
  name: string;
  A: RelationEnd;
  B: RelationEnd;
}>;

/**
 * A relation end a type participates in, with or without a field.
 */
export type RelationParticipation = Readonly<{
  relation: string;
  side: RelationSide;
}>;

// ============================================================
// Bound Types
// ============================================================

export type PropsSchema = z.ZodType<Record<string, unknown>>;

export type BoundType = Readonly<{
  name: string;
  plural: string;
  description: string | undefined;
  /** All fields including system fields, in declaration order */
  fields: ReadonlyMap<string, BoundField>;
  scalarFields: readonly BoundScalarField[];
  relationFields: readonly BoundRelationField[];
  /** Fields usable as single-node selector keys (id first) */
  uniqueFields: readonly string[];
  /** Every relation end this type sits on */
  participations: readonly RelationParticipation[];
  /** Validates stored props (declared scalar fields only) */
  propsSchema: PropsSchema;
  /** Validates scalar props of `updateMany` data */
  patchSchema: PropsSchema;
}>;

// ============================================================
// Operation Catalog
// ============================================================

export type OperationAction =
  | "findUnique"
  | "findMany"
  | "connection"
  | "create"
  | "update"
  | "upsert"
  | "delete"
  | "updateMany"
  | "deleteMany";

export type OperationKind = "query" | "mutation";

export type OperationDescriptor = Readonly<{
  name: string;
  kind: OperationKind;
  action: OperationAction;
  type: string;
}>;

export type OperationCatalog = ReadonlyMap<string, OperationDescriptor>;

// ============================================================
// Bound Schema
// ============================================================

export type BoundSchema = Readonly<{
  /** Service identifier; isolates stored data between services */
  id: string;
  types: ReadonlyMap<string, BoundType>;
  relations: ReadonlyMap<string, BoundRelation>;
  catalog: OperationCatalog;
}>;
