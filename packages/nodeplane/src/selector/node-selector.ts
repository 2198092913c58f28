/**
 * Node Selector
 *
 * Resolves `where` arguments to stored nodes: a unique selector names
 * exactly one node by `id` or a unique field, a filter selects any number.
 */
import { type NodeSnapshot } from "../core/types";
import { SelectorError } from "../errors/index";
import { getBoundType } from "../schema/binder";
import { type BoundScalarField, type BoundType } from "../schema/types";
import { scalarValueSchema } from "../schema/values";
import { listNodes, readNode } from "../store/nodes";
import { type StoreContext } from "../store/types";
import { computeUniqueKey } from "../store/uniqueness";
import { compileFilter, filterNodes } from "./where";

// ============================================================
// Unique Selectors
// ============================================================

export type UniqueSelector = Readonly<{
  field: BoundScalarField;
  value: unknown;
}>;

function describeWhere(where: unknown): Record<string, unknown> {
  if (typeof where !== "object" || where === null || Array.isArray(where)) {
    return {};
  }
  return Object.fromEntries(Object.entries(where));
}

/**
 * Checks that `where` names exactly one unique field with a usable value.
 *
 * @throws SelectorError (INVALID_SELECTOR, NON_UNIQUE_SELECTOR)
 */
export function parseUniqueSelector(
  type: BoundType,
  where: unknown,
): UniqueSelector {
  const entries = Object.entries(describeWhere(where)).filter(
    ([, value]) => value !== undefined,
  );

  const [entry] = entries;
  if (entry === undefined || entries.length !== 1) {
    throw new SelectorError(
      `A ${type.name} selector must name exactly one unique field, got ${entries.length}`,
      "INVALID_SELECTOR",
      { type: type.name, where: describeWhere(where), uniqueFields: type.uniqueFields },
    );
  }

  const [name, value] = entry;
  const field = type.fields.get(name);
  if (field?.kind !== "scalar" || !field.unique) {
    throw new SelectorError(
      `"${name}" does not identify a single ${type.name}`,
      "NON_UNIQUE_SELECTOR",
      { type: type.name, field: name, uniqueFields: type.uniqueFields },
    );
  }

  const parsed =
    value === null ? undefined : (
      scalarValueSchema(field.type, field.values).safeParse(value)
    );
  if (parsed === undefined || !parsed.success) {
    throw new SelectorError(
      `Selector value for "${type.name}.${name}" must be a non-null ${field.type}`,
      "INVALID_SELECTOR",
      { type: type.name, field: name },
      { cause: parsed?.error },
    );
  }

  return { field, value: parsed.data };
}

/**
 * Finds the node a unique selector names, if any.
 *
 * @throws SelectorError when the selector itself is malformed
 */
export async function findUnique(
  ctx: StoreContext,
  typeName: string,
  where: unknown,
): Promise<NodeSnapshot | undefined> {
  const type = getBoundType(ctx.schema, typeName);
  const selector = parseUniqueSelector(type, where);

  if (selector.field.name === "id") {
    return typeof selector.value === "string" ?
        readNode(ctx, typeName, selector.value)
      : undefined;
  }

  const holder = await ctx.backend.findUnique({
    serviceId: ctx.schema.id,
    kind: typeName,
    field: selector.field.name,
    key: computeUniqueKey(selector.value),
  });
  return holder === undefined ? undefined : readNode(ctx, typeName, holder);
}

/**
 * Resolves a unique selector to exactly one node.
 *
 * @throws SelectorError (NODE_NOT_FOUND) when nothing matches
 */
export async function selectUnique(
  ctx: StoreContext,
  typeName: string,
  where: unknown,
): Promise<NodeSnapshot> {
  const node = await findUnique(ctx, typeName, where);
  if (node === undefined) {
    throw new SelectorError(
      `No ${typeName} found for ${JSON.stringify(describeWhere(where))}`,
      "NODE_NOT_FOUND",
      { type: typeName, where: describeWhere(where) },
    );
  }
  return node;
}

// ============================================================
// Filters
// ============================================================

/**
 * Selects every node of a type that matches a filter, in id order.
 * Matching nothing is not an error.
 *
 * @throws SelectorError (INVALID_FILTER) for a malformed filter
 */
export async function selectMany(
  ctx: StoreContext,
  typeName: string,
  where: unknown,
): Promise<NodeSnapshot[]> {
  const condition = compileFilter(ctx.schema, typeName, where);
  return filterNodes(ctx, condition, await listNodes(ctx, typeName));
}
