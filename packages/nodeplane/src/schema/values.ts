import { z } from "zod";

import { type ScalarFieldDef, type ScalarType } from "../core/types";
import { isValidIsoDate, normalizeIsoDate } from "../utils/date";
import { type PropsSchema } from "./types";

// ============================================================
// Scalar Value Schemas
// ============================================================

const jsonValue: z.ZodType = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

const dateTimeValue = z
  .string()
  .refine(isValidIsoDate, "Expected an ISO 8601 datetime")
  .transform(normalizeIsoDate);

/**
 * Schema for a single non-null value of a scalar type.
 */
export function scalarValueSchema(
  type: ScalarType,
  values: readonly string[] | undefined,
): z.ZodType {
  switch (type) {
    case "ID": {
      return z.string().min(1);
    }
    case "String": {
      if (values === undefined) return z.string();
      return z
        .string()
        .refine(
          (value) => values.includes(value),
          `Expected one of: ${values.join(", ")}`,
        );
    }
    case "Int": {
      return z.number().int();
    }
    case "Float": {
      return z.number();
    }
    case "Boolean": {
      return z.boolean();
    }
    case "DateTime": {
      return dateTimeValue;
    }
    case "Json": {
      return jsonValue;
    }
  }
}

// ============================================================
// Props Schemas
// ============================================================

type NamedScalarField = Readonly<{ name: string; def: ScalarFieldDef }>;

/**
 * Schema for the stored props of a type. Applies defaults for omitted
 * fields and accepts `null` on optional fields.
 */
export function buildPropsSchema(
  fields: readonly NamedScalarField[],
): PropsSchema {
  const shape: Record<string, z.ZodType> = {};

  for (const { name, def } of fields) {
    const base = scalarValueSchema(def.type, def.values);
    const field: z.ZodType =
      def.required ? base : base.nullable().optional();
    shape[name] = def.default === undefined ? field : field.default(def.default);
  }

  return z.object(shape).strict();
}

/**
 * Schema for a partial write of scalar props, used by batch updates
 * where every member receives the same values.
 */
export function buildPatchSchema(
  fields: readonly NamedScalarField[],
): PropsSchema {
  const shape: Record<string, z.ZodType> = {};

  for (const { name, def } of fields) {
    const base = scalarValueSchema(def.type, def.values);
    shape[name] = (def.required ? base : base.nullable()).optional();
  }

  return z.object(shape).strict();
}
