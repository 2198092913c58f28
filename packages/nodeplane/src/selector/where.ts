/**
 * Filter language for `where` arguments.
 *
 * A filter is an object whose keys are field names, optionally followed by
 * an operator suffix (`title_contains`, `age_gte`, `posts_some`), or one of
 * the combinators `AND`, `OR` and `NOT`. Field names never contain an
 * underscore, so the first underscore always starts the operator.
 *
 * @example
 * ```typescript
 * const filter = compileFilter(schema, "User", {
 *   email_ends_with: "@example.com",
 *   posts_some: { published: true },
 *   NOT: [{ name: null }],
 * });
 * const matches = await evaluateFilter(ctx, filter, user);
 * ```
 */
import { type NodeSnapshot } from "../core/types";
import { SelectorError } from "../errors/index";
import { getBoundType } from "../schema/binder";
import {
  type BoundRelationField,
  type BoundSchema,
  type BoundScalarField,
  type BoundType,
} from "../schema/types";
import { scalarValueSchema } from "../schema/values";
import { linkedNodes } from "../store/links";
import { type StoreContext } from "../store/types";

// ============================================================
// Compiled Filter
// ============================================================

export type ScalarOperator =
  | "equals"
  | "not"
  | "in"
  | "not_in"
  | "lt"
  | "lte"
  | "gt"
  | "gte"
  | "contains"
  | "not_contains"
  | "starts_with"
  | "not_starts_with"
  | "ends_with"
  | "not_ends_with";

export type RelationOperator = "is" | "some" | "every" | "none";

export type Condition =
  | Readonly<{
      kind: "scalar";
      field: BoundScalarField;
      operator: ScalarOperator;
      value: unknown;
    }>
  | Readonly<{
      kind: "relation";
      field: BoundRelationField;
      operator: RelationOperator;
      /** Nested filter; null for `field: null` ("not linked") */
      filter: Condition | null;
    }>
  | Readonly<{ kind: "and"; conditions: readonly Condition[] }>
  | Readonly<{ kind: "or"; conditions: readonly Condition[] }>
  | Readonly<{ kind: "none"; conditions: readonly Condition[] }>;

const MATCH_ALL: Condition = { kind: "and", conditions: [] };

const ORDERED_OPERATORS = new Set<string>(["lt", "lte", "gt", "gte"]);

const STRING_OPERATORS = new Set<string>([
  "contains",
  "not_contains",
  "starts_with",
  "not_starts_with",
  "ends_with",
  "not_ends_with",
]);

const ORDERED_TYPES = new Set<string>(["ID", "String", "Int", "Float", "DateTime"]);

// ============================================================
// Compilation
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function filterError(
  type: string,
  key: string,
  message: string,
  cause?: unknown,
): SelectorError {
  return new SelectorError(
    `Invalid filter "${key}" on ${type}: ${message}`,
    "INVALID_FILTER",
    { type, key },
    {
      cause,
      suggestion: `Use a field of ${type}, optionally followed by an operator such as _in, _lt, _contains or _some.`,
    },
  );
}

function splitKey(key: string): [field: string, operator: string | undefined] {
  const index = key.indexOf("_");
  if (index === -1) return [key, undefined];
  return [key.slice(0, index), key.slice(index + 1)];
}

function parseScalarValue(
  type: BoundType,
  key: string,
  field: BoundScalarField,
  value: unknown,
  values: readonly string[] | undefined = field.values,
): unknown {
  if (value === null) return null;
  const result = scalarValueSchema(field.type, values).safeParse(value);
  if (!result.success) {
    throw filterError(
      type.name,
      key,
      values === undefined ?
        `expected a ${field.type} value`
      : `expected one of ${values.join(", ")}`,
      result.error,
    );
  }
  return result.data;
}

function compileScalar(
  type: BoundType,
  key: string,
  field: BoundScalarField,
  operator: string | undefined,
  value: unknown,
): Condition {
  if (operator === undefined) {
    return {
      kind: "scalar",
      field,
      operator: "equals",
      value: parseScalarValue(type, key, field, value),
    };
  }

  const scalarOperator = toScalarOperator(operator);
  if (scalarOperator === undefined) {
    throw filterError(type.name, key, `unknown operator "_${operator}"`);
  }

  if (scalarOperator === "in" || scalarOperator === "not_in") {
    if (!Array.isArray(value)) {
      throw filterError(type.name, key, "expected a list of values");
    }
    return {
      kind: "scalar",
      field,
      operator: scalarOperator,
      value: value.map((item) => parseScalarValue(type, key, field, item)),
    };
  }

  if (ORDERED_OPERATORS.has(operator) && !ORDERED_TYPES.has(field.type)) {
    throw filterError(type.name, key, `${field.type} values are not ordered`);
  }
  if (STRING_OPERATORS.has(operator)) {
    if (field.type !== "String" && field.type !== "ID") {
      throw filterError(type.name, key, `only applies to String fields`);
    }
    if (typeof value !== "string") {
      throw filterError(type.name, key, "expected a string");
    }
  }

  return {
    kind: "scalar",
    field,
    operator: scalarOperator,
    // Substring operators take fragments of a value, not declared values.
    value: parseScalarValue(
      type,
      key,
      field,
      value,
      STRING_OPERATORS.has(operator) ? undefined : field.values,
    ),
  };
}

function toScalarOperator(operator: string): ScalarOperator | undefined {
  switch (operator) {
    case "not":
    case "in":
    case "not_in":
    case "lt":
    case "lte":
    case "gt":
    case "gte":
    case "contains":
    case "not_contains":
    case "starts_with":
    case "not_starts_with":
    case "ends_with":
    case "not_ends_with": {
      return operator;
    }
    default: {
      return undefined;
    }
  }
}

function compileRelation(
  schema: BoundSchema,
  type: BoundType,
  key: string,
  field: BoundRelationField,
  operator: string | undefined,
  value: unknown,
): Condition {
  if (operator === undefined) {
    if (field.list) {
      throw filterError(
        type.name,
        key,
        "list relations are filtered with _some, _every or _none",
      );
    }
    if (value === null) {
      return { kind: "relation", field, operator: "is", filter: null };
    }
    return {
      kind: "relation",
      field,
      operator: "is",
      filter: compileFilter(schema, field.target, value),
    };
  }

  if (operator !== "some" && operator !== "every" && operator !== "none") {
    throw filterError(type.name, key, `unknown operator "_${operator}"`);
  }
  if (!field.list) {
    throw filterError(type.name, key, `_${operator} only applies to list relations`);
  }
  return {
    kind: "relation",
    field,
    operator,
    filter: compileFilter(schema, field.target, value),
  };
}

function compileCombinator(
  schema: BoundSchema,
  type: BoundType,
  key: "AND" | "OR" | "NOT",
  value: unknown,
): Condition {
  const items: readonly unknown[] = Array.isArray(value) ? value : [value];
  const conditions = items.map((item) => compileFilter(schema, type.name, item));
  switch (key) {
    case "AND": {
      return { kind: "and", conditions };
    }
    case "OR": {
      return { kind: "or", conditions };
    }
    case "NOT": {
      return { kind: "none", conditions };
    }
  }
}

/**
 * Compiles a `where` filter against a type.
 *
 * @throws SelectorError (INVALID_FILTER) for unknown fields, operators or values
 */
export function compileFilter(
  schema: BoundSchema,
  typeName: string,
  where: unknown,
): Condition {
  const type = getBoundType(schema, typeName);
  if (where === undefined || where === null) return MATCH_ALL;
  if (!isRecord(where)) {
    throw filterError(typeName, "where", "expected an object");
  }

  const conditions: Condition[] = [];
  for (const [key, value] of Object.entries(where)) {
    if (value === undefined) continue;

    if (key === "AND" || key === "OR" || key === "NOT") {
      conditions.push(compileCombinator(schema, type, key, value));
      continue;
    }

    const [fieldName, operator] = splitKey(key);
    const field = type.fields.get(fieldName);
    if (field === undefined) {
      throw filterError(typeName, key, `${typeName} has no field "${fieldName}"`);
    }

    conditions.push(
      field.kind === "scalar" ?
        compileScalar(type, key, field, operator, value)
      : compileRelation(schema, type, key, field, operator, value),
    );
  }

  return conditions.length === 1 && conditions[0] !== undefined ?
      conditions[0]
    : { kind: "and", conditions };
}

// ============================================================
// Evaluation
// ============================================================

function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === null || right === null) return left === right;
  if (typeof left === "object" || typeof right === "object") {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return left === right;
}

function compareOrdered(left: unknown, right: unknown): number | undefined {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  if (typeof left === "string" && typeof right === "string") {
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }
  return undefined;
}

function matchesScalar(
  operator: ScalarOperator,
  actual: unknown,
  expected: unknown,
): boolean {
  switch (operator) {
    case "equals": {
      return valuesEqual(actual, expected);
    }
    case "not": {
      return !valuesEqual(actual, expected);
    }
    case "in":
    case "not_in": {
      const list = Array.isArray(expected) ? expected : [];
      const found = list.some((item) => valuesEqual(actual, item));
      return operator === "in" ? found : !found;
    }
    case "lt":
    case "lte":
    case "gt":
    case "gte": {
      const order = compareOrdered(actual, expected);
      if (order === undefined) return false;
      if (operator === "lt") return order < 0;
      if (operator === "lte") return order <= 0;
      if (operator === "gt") return order > 0;
      return order >= 0;
    }
    case "contains":
    case "not_contains":
    case "starts_with":
    case "not_starts_with":
    case "ends_with":
    case "not_ends_with": {
      if (typeof actual !== "string" || typeof expected !== "string") {
        return false;
      }
      if (operator === "contains") return actual.includes(expected);
      if (operator === "not_contains") return !actual.includes(expected);
      if (operator === "starts_with") return actual.startsWith(expected);
      if (operator === "not_starts_with") return !actual.startsWith(expected);
      if (operator === "ends_with") return actual.endsWith(expected);
      return !actual.endsWith(expected);
    }
  }
}

async function matchesEach(
  ctx: StoreContext,
  condition: Condition | null,
  nodes: readonly NodeSnapshot[],
): Promise<boolean[]> {
  const results: boolean[] = [];
  for (const node of nodes) {
    results.push(
      condition === null ? true : await evaluateFilter(ctx, condition, node),
    );
  }
  return results;
}

/**
 * Evaluates a compiled filter against a node.
 */
export async function evaluateFilter(
  ctx: StoreContext,
  condition: Condition,
  node: NodeSnapshot,
): Promise<boolean> {
  switch (condition.kind) {
    case "scalar": {
      return matchesScalar(
        condition.operator,
        node[condition.field.name] ?? null,
        condition.value,
      );
    }
    case "and": {
      for (const child of condition.conditions) {
        if (!(await evaluateFilter(ctx, child, node))) return false;
      }
      return true;
    }
    case "or": {
      for (const child of condition.conditions) {
        if (await evaluateFilter(ctx, child, node)) return true;
      }
      return false;
    }
    case "none": {
      for (const child of condition.conditions) {
        if (await evaluateFilter(ctx, child, node)) return false;
      }
      return true;
    }
    case "relation": {
      const partners = await linkedNodes(ctx, condition.field, node.id);
      const results = await matchesEach(ctx, condition.filter, partners);
      switch (condition.operator) {
        case "is": {
          if (condition.filter === null) return partners.length === 0;
          return results.some(Boolean);
        }
        case "some": {
          return results.some(Boolean);
        }
        case "every": {
          return results.every(Boolean);
        }
        case "none": {
          return !results.some(Boolean);
        }
      }
    }
  }
}

/**
 * Keeps the nodes a compiled filter matches, in their original order.
 */
export async function filterNodes(
  ctx: StoreContext,
  condition: Condition,
  nodes: readonly NodeSnapshot[],
): Promise<NodeSnapshot[]> {
  const matched: NodeSnapshot[] = [];
  for (const node of nodes) {
    if (await evaluateFilter(ctx, condition, node)) matched.push(node);
  }
  return matched;
}
