/**
 * Loads a data model written as JSON.
 *
 * @example
 * ```json
 * {
 *   "types": [
 *     {
 *       "name": "User",
 *       "fields": {
 *         "email": { "type": "String", "required": true, "unique": true },
 *         "role": { "enum": ["ADMIN", "MEMBER"], "default": "MEMBER" },
 *         "posts": { "relation": "Post", "list": true, "onDelete": "CASCADE" }
 *       }
 *     }
 *   ]
 * }
 * ```
 */

import { z } from "zod";

import { defineType } from "../core/define-type";
import { enumeration, relation, scalar } from "../core/field";
import {
  DECLARABLE_SCALAR_TYPES,
  type FieldDef,
  type TypeDef,
} from "../core/types";
import { SchemaError } from "../errors/index";

// ============================================================
// Datamodel Document Schema
// ============================================================

const valueOptionsShape = {
  required: z.boolean().optional(),
  unique: z.boolean().optional(),
  default: z.unknown().optional(),
};

const scalarFieldSchema = z
  .object({
    type: z.enum(DECLARABLE_SCALAR_TYPES),
    ...valueOptionsShape,
  })
  .strict();

const enumFieldSchema = z
  .object({
    enum: z.array(z.string().min(1)).min(1),
    ...valueOptionsShape,
  })
  .strict();

const relationFieldSchema = z
  .object({
    relation: z.string().min(1),
    list: z.boolean().optional(),
    required: z.boolean().optional(),
    name: z.string().min(1).optional(),
    onDelete: z.enum(["CASCADE", "SET_NULL"]).optional(),
  })
  .strict();

const fieldSchema = z.union([
  scalarFieldSchema,
  enumFieldSchema,
  relationFieldSchema,
]);

const typeSchema = z
  .object({
    name: z.string().min(1),
    plural: z.string().min(1).optional(),
    description: z.string().optional(),
    fields: z.record(z.string(), fieldSchema),
  })
  .strict();

export const datamodelSchema = z
  .object({
    types: z.array(typeSchema),
  })
  .strict();

export type DatamodelDocument = z.infer<typeof datamodelSchema>;

type FieldDocument = z.infer<typeof fieldSchema>;

// ============================================================
// Loading
// ============================================================

function toFieldDef(field: FieldDocument): FieldDef {
  if ("relation" in field) {
    return relation(field.relation, {
      ...(field.list !== undefined && { list: field.list }),
      ...(field.required !== undefined && { required: field.required }),
      ...(field.name !== undefined && { name: field.name }),
      ...(field.onDelete !== undefined && { onDelete: field.onDelete }),
    });
  }

  const options = {
    ...(field.required !== undefined && { required: field.required }),
    ...(field.unique !== undefined && { unique: field.unique }),
    ...(field.default !== undefined && { default: field.default }),
  };

  if ("enum" in field) {
    return enumeration(field.enum, options);
  }
  return scalar(field.type, options);
}

/**
 * Parses a JSON data model into type definitions ready for `bindSchema`.
 *
 * @throws SchemaError when the document does not describe a data model
 */
export function loadDatamodel(document: unknown): readonly TypeDef[] {
  const result = datamodelSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new SchemaError(
      `Invalid data model: ${issues
        .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
        .join("; ")}`,
      { issues },
      { cause: result.error },
    );
  }

  return result.data.types.map((type) => {
    const fields: Record<string, FieldDef> = {};
    for (const [name, field] of Object.entries(type.fields)) {
      fields[name] = toFieldDef(field);
    }
    return defineType(type.name, {
      fields,
      ...(type.plural !== undefined && { plural: type.plural }),
      ...(type.description !== undefined && { description: type.description }),
    });
  });
}
