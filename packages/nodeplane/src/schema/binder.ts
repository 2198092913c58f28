/**
 * Schema Binder
 *
 * Turns declared types into a validated, immutable BoundSchema: relation
 * fields are paired into named relations, deletion policies are checked
 * against required fields, per-type value schemas are compiled and the
 * operation catalog is built.
 *
 * @example
 * ```typescript
 * const schema = bindSchema({ id: "blog@dev", types: [User, Post] });
 * schema.catalog.get("createUser"); // { action: "create", type: "User", ... }
 * ```
 */

import { SYSTEM_FIELDS } from "../core/define-type";
import {
  isRelationField,
  type RelationFieldDef,
  type ScalarFieldDef,
  type TypeDef,
} from "../core/types";
import { SchemaError } from "../errors/index";
import { buildCatalog, pluralize } from "./catalog";
import {
  type BoundField,
  type BoundRelation,
  type BoundRelationField,
  type BoundScalarField,
  type BoundSchema,
  type BoundType,
  type RelationEnd,
  type RelationParticipation,
  type RelationSide,
} from "./types";
import { buildPatchSchema, buildPropsSchema, scalarValueSchema } from "./values";

// ============================================================
// Types
// ============================================================

export type BindSchemaInput = Readonly<{
  /** Service identifier */
  id: string;
  types: readonly TypeDef[];
}>;

type RelationFieldEntry = Readonly<{
  type: string;
  field: string;
  def: RelationFieldDef;
}>;

type ResolvedRelationField = Readonly<{
  relation: string;
  side: RelationSide;
  opposite: Readonly<{ type: string; field: string }> | undefined;
}>;

const TYPE_NAME_PATTERN = /^[A-Z][A-Za-z0-9]*$/;
const FIELD_NAME_PATTERN = /^[a-z][A-Za-z0-9]*$/;
const RESERVED_FIELD_NAMES = new Set<string>(SYSTEM_FIELDS);

// ============================================================
// Name Checks
// ============================================================

function checkTypeNames(types: readonly TypeDef[]): void {
  const seen = new Set<string>();
  for (const type of types) {
    if (!TYPE_NAME_PATTERN.test(type.name)) {
      throw new SchemaError(
        `Type name "${type.name}" must start with an uppercase letter and contain only letters and digits`,
        { type: type.name },
      );
    }
    if (seen.has(type.name)) {
      throw new SchemaError(`Type "${type.name}" is declared more than once`, {
        type: type.name,
      });
    }
    seen.add(type.name);
  }
}

function checkFieldName(type: string, field: string): void {
  if (!FIELD_NAME_PATTERN.test(field)) {
    throw new SchemaError(
      `Field name "${type}.${field}" must start with a lowercase letter and contain only letters and digits`,
      { type, field },
    );
  }
  if (RESERVED_FIELD_NAMES.has(field)) {
    throw new SchemaError(`Field name "${type}.${field}" is reserved`, {
      type,
      field,
    });
  }
}

// ============================================================
// Scalar Fields
// ============================================================

function checkScalarField(
  type: string,
  field: string,
  def: ScalarFieldDef,
): void {
  if (def.type === "ID") {
    throw new SchemaError(
      `Field "${type}.${field}" cannot be of type ID; every type has an implicit "id" field`,
      { type, field },
      { suggestion: `Declare the field as "String" with unique: true.` },
    );
  }
  if (def.values?.length === 0) {
    throw new SchemaError(
      `Enumeration field "${type}.${field}" declares no values`,
      { type, field },
    );
  }
  if (def.default !== undefined) {
    const result = scalarValueSchema(def.type, def.values).safeParse(
      def.default,
    );
    if (!result.success) {
      throw new SchemaError(
        `Default value of "${type}.${field}" does not match its type ${def.type}`,
        { type, field, default: def.default },
        { cause: result.error },
      );
    }
  }
}

function systemField(
  name: string,
  type: "ID" | "DateTime",
  unique: boolean,
): BoundScalarField {
  return {
    kind: "scalar",
    name,
    type,
    values: undefined,
    required: true,
    unique,
    system: true,
  };
}

const ID_FIELD = systemField("id", "ID", true);
const CREATED_AT_FIELD = systemField("createdAt", "DateTime", false);
const UPDATED_AT_FIELD = systemField("updatedAt", "DateTime", false);

// ============================================================
// Relation Pairing
// ============================================================

/**
 * Default relation name: both type names sorted and joined with "To".
 */
export function defaultRelationName(a: string, b: string): string {
  return [a, b].sort().join("To");
}

function endKey(type: string, field: string): string {
  return `${type}.${field}`;
}

function collectRelationFields(
  types: readonly TypeDef[],
  typeNames: ReadonlySet<string>,
): Map<string, RelationFieldEntry[]> {
  const groups = new Map<string, RelationFieldEntry[]>();

  for (const type of types) {
    for (const [field, def] of Object.entries(type.fields)) {
      if (!isRelationField(def)) continue;

      if (!typeNames.has(def.target)) {
        throw new SchemaError(
          `Relation field "${type.name}.${field}" targets unknown type "${def.target}"`,
          { type: type.name, field, target: def.target },
        );
      }
      if (def.list && def.required) {
        throw new SchemaError(
          `List relation field "${type.name}.${field}" cannot be required`,
          { type: type.name, field },
          { suggestion: `Remove "required" from the list field.` },
        );
      }

      const name = def.name ?? defaultRelationName(type.name, def.target);
      const group = groups.get(name) ?? [];
      group.push({ type: type.name, field, def });
      groups.set(name, group);
    }
  }

  return groups;
}

function ambiguityError(
  name: string,
  entries: readonly RelationFieldEntry[],
): SchemaError {
  const fields = entries.map((entry) => endKey(entry.type, entry.field));
  return new SchemaError(
    `Relation "${name}" is ambiguous: ${fields.join(", ")}`,
    { relation: name, fields },
    {
      suggestion: `Give each relation between the same types a distinct "name", shared only by the two fields that form it.`,
    },
  );
}

function toEnd(entry: RelationFieldEntry): RelationEnd {
  return { type: entry.type, field: entry.field, onDelete: entry.def.onDelete };
}

function pairRelation(
  name: string,
  entries: readonly RelationFieldEntry[],
): BoundRelation {
  const [first, second] = entries;
  if (first === undefined || entries.length > 2) {
    throw ambiguityError(name, entries);
  }

  if (second === undefined) {
    return {
      name,
      A: toEnd(first),
      B: { type: first.def.target, field: undefined, onDelete: "SET_NULL" },
    };
  }

  const pointsAtEachOther =
    first.def.target === second.type && second.def.target === first.type;
  // Two unnamed fields of a type pointing at itself are two relations, not one.
  const unnamedSelfPair =
    first.type === second.type &&
    first.def.name === undefined &&
    second.def.name === undefined;
  if (!pointsAtEachOther || unnamedSelfPair) {
    throw ambiguityError(name, entries);
  }

  const firstIsA =
    endKey(first.type, first.field) < endKey(second.type, second.field);
  const [a, b] = firstIsA ? [first, second] : [second, first];
  return { name, A: toEnd(a), B: toEnd(b) };
}

function requiredFieldOf(
  end: RelationEnd,
  typesByName: ReadonlyMap<string, TypeDef>,
): RelationFieldDef | undefined {
  if (end.field === undefined) return undefined;
  const def = typesByName.get(end.type)?.fields[end.field];
  if (def === undefined || !isRelationField(def) || !def.required) {
    return undefined;
  }
  return def;
}

/**
 * Rejects a SET_NULL direction whose other end is a required single field:
 * deleting a node on the SET_NULL end would leave that field empty.
 */
function checkDeletePolicies(
  relation: BoundRelation,
  typesByName: ReadonlyMap<string, TypeDef>,
): void {
  const directions: readonly [RelationEnd, RelationEnd][] = [
    [relation.A, relation.B],
    [relation.B, relation.A],
  ];

  for (const [deleted, other] of directions) {
    if (deleted.onDelete !== "SET_NULL") continue;
    if (requiredFieldOf(other, typesByName) === undefined) continue;

    const otherField = endKey(other.type, other.field ?? "");
    throw new SchemaError(
      deleted.field === undefined ?
        `Required relation field "${otherField}" has no opposite field, so deleting a ${deleted.type} would leave it empty`
      : `Deleting a ${deleted.type} sets "${otherField}" to null, but the field is required`,
      {
        relation: relation.name,
        field: otherField,
        ...(deleted.field !== undefined && {
          policyField: endKey(deleted.type, deleted.field),
        }),
      },
      {
        suggestion:
          deleted.field === undefined ?
            `Add an opposite field on ${deleted.type} with onDelete: "CASCADE", or make "${otherField}" optional.`
          : `Set onDelete: "CASCADE" on "${endKey(deleted.type, deleted.field)}", or make "${otherField}" optional.`,
      },
    );
  }
}

function resolveRelationField(
  relation: BoundRelation,
  type: string,
  field: string,
): ResolvedRelationField {
  const isA = relation.A.type === type && relation.A.field === field;
  const opposite = isA ? relation.B : relation.A;
  return {
    relation: relation.name,
    side: isA ? "A" : "B",
    opposite:
      opposite.field === undefined ?
        undefined
      : { type: opposite.type, field: opposite.field },
  };
}

// ============================================================
// Type Binding
// ============================================================

function bindType(
  type: TypeDef,
  relations: ReadonlyMap<string, BoundRelation>,
  fieldRelations: ReadonlyMap<string, string>,
): BoundType {
  const fields = new Map<string, BoundField>();
  const scalarDefs: { name: string; def: ScalarFieldDef }[] = [];
  const relationFields: BoundRelationField[] = [];

  fields.set(ID_FIELD.name, ID_FIELD);

  for (const [name, def] of Object.entries(type.fields)) {
    if (isRelationField(def)) {
      const relationName = fieldRelations.get(endKey(type.name, name));
      const relation =
        relationName === undefined ? undefined : relations.get(relationName);
      if (relation === undefined) {
        throw new SchemaError(
          `Relation field "${type.name}.${name}" could not be resolved`,
          { type: type.name, field: name },
        );
      }
      const bound: BoundRelationField = {
        kind: "relation",
        name,
        target: def.target,
        list: def.list,
        required: def.required,
        onDelete: def.onDelete,
        ...resolveRelationField(relation, type.name, name),
      };
      relationFields.push(bound);
      fields.set(name, bound);
      continue;
    }

    scalarDefs.push({ name, def });
    fields.set(name, {
      kind: "scalar",
      name,
      type: def.type,
      values: def.values,
      required: def.required,
      unique: def.unique,
      system: false,
    });
  }

  fields.set(CREATED_AT_FIELD.name, CREATED_AT_FIELD);
  fields.set(UPDATED_AT_FIELD.name, UPDATED_AT_FIELD);

  const scalarFields = [...fields.values()].filter(
    (field): field is BoundScalarField => field.kind === "scalar",
  );

  const participations: RelationParticipation[] = [];
  for (const relation of relations.values()) {
    if (relation.A.type === type.name) {
      participations.push({ relation: relation.name, side: "A" });
    }
    if (relation.B.type === type.name) {
      participations.push({ relation: relation.name, side: "B" });
    }
  }

  return Object.freeze({
    name: type.name,
    plural: type.plural ?? pluralize(type.name),
    description: type.description,
    fields,
    scalarFields,
    relationFields,
    uniqueFields: scalarFields
      .filter((field) => field.unique)
      .map((field) => field.name),
    participations,
    propsSchema: buildPropsSchema(scalarDefs),
    patchSchema: buildPatchSchema(scalarDefs),
  });
}

// ============================================================
// Bind
// ============================================================

/**
 * Validates a data model and binds it into an immutable schema.
 *
 * @throws SchemaError when the data model is inconsistent
 */
export function bindSchema(input: BindSchemaInput): BoundSchema {
  if (input.id.trim() === "") {
    throw new SchemaError(`Service id must not be empty`);
  }

  checkTypeNames(input.types);
  const typesByName = new Map(input.types.map((type) => [type.name, type]));

  for (const type of input.types) {
    for (const [field, def] of Object.entries(type.fields)) {
      checkFieldName(type.name, field);
      if (!isRelationField(def)) checkScalarField(type.name, field, def);
    }
  }

  const groups = collectRelationFields(input.types, new Set(typesByName.keys()));
  const relations = new Map<string, BoundRelation>();
  const fieldRelations = new Map<string, string>();

  for (const [name, entries] of groups) {
    const relation = pairRelation(name, entries);
    checkDeletePolicies(relation, typesByName);
    relations.set(name, relation);
    for (const entry of entries) {
      fieldRelations.set(endKey(entry.type, entry.field), name);
    }
  }

  const types = new Map<string, BoundType>();
  for (const type of input.types) {
    types.set(type.name, bindType(type, relations, fieldRelations));
  }

  return Object.freeze({
    id: input.id,
    types,
    relations,
    catalog: buildCatalog(types.values()),
  });
}

// ============================================================
// Lookups
// ============================================================

/**
 * Returns a bound type by name.
 *
 * @throws SchemaError when the type is not part of the schema
 */
export function getBoundType(schema: BoundSchema, name: string): BoundType {
  const type = schema.types.get(name);
  if (type === undefined) {
    throw new SchemaError(`Type "${name}" is not part of the schema`, {
      type: name,
      available: [...schema.types.keys()],
    });
  }
  return type;
}

/**
 * Returns a relation field of a bound type, if the name is one.
 */
export function getRelationField(
  type: BoundType,
  name: string,
): BoundRelationField | undefined {
  const field = type.fields.get(name);
  return field?.kind === "relation" ? field : undefined;
}

/**
 * Returns the bound relation a relation field belongs to.
 */
export function getRelation(
  schema: BoundSchema,
  field: BoundRelationField,
): BoundRelation {
  const relation = schema.relations.get(field.relation);
  if (relation === undefined) {
    throw new SchemaError(`Relation "${field.relation}" is not part of the schema`, {
      relation: field.relation,
    });
  }
  return relation;
}
