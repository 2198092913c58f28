/**
 * Connection / Aggregation Resolver
 *
 * Produces ordered pages of nodes with cursors and an aggregate count of
 * the whole filtered set. A window is applied in a fixed order:
 * filter, sort, `after`/`before`, `skip`, `first`, `last`.
 *
 * @example
 * ```typescript
 * const page = await resolveConnection(ctx, "Post", {
 *   where: { published: true },
 *   orderBy: "createdAt_DESC",
 *   first: 10,
 * });
 * page.aggregate.count; // every published post, not just these 10
 * ```
 */
import { type NodeSnapshot } from "../core/types";
import { RequestError } from "../errors/index";
import { getBoundType, getRelationField } from "../schema/binder";
import { compileFilter, filterNodes } from "../selector/where";
import { linkedNodes } from "../store/links";
import { listNodes } from "../store/nodes";
import { type StoreContext } from "../store/types";
import { parseListArgs } from "./args";
import { parseOrderBy, sortNodes } from "./order";

// ============================================================
// Types
// ============================================================

/**
 * Restricts a resolution to the nodes linked to one source node through
 * a list relation field.
 */
export type ConnectionScope = Readonly<{
  type: string;
  id: string;
  field: string;
}>;

export type PageInfo = Readonly<{
  hasNextPage: boolean;
  hasPreviousPage: boolean;
  startCursor: string | null;
  endCursor: string | null;
}>;

export type Edge = Readonly<{
  node: NodeSnapshot;
  cursor: string;
}>;

export type Connection = Readonly<{
  pageInfo: PageInfo;
  edges: readonly Edge[];
  aggregate: Readonly<{ count: number }>;
}>;

type Window = Readonly<{
  nodes: readonly NodeSnapshot[];
  total: number;
  start: number;
  end: number;
}>;

// ============================================================
// Resolution
// ============================================================

async function candidates(
  ctx: StoreContext,
  typeName: string,
  scope: ConnectionScope | undefined,
): Promise<NodeSnapshot[]> {
  if (scope === undefined) return listNodes(ctx, typeName);

  const field = getRelationField(getBoundType(ctx.schema, scope.type), scope.field);
  if (field?.target !== typeName) {
    throw new RequestError(
      `"${scope.type}.${scope.field}" is not a relation to ${typeName}`,
      "INVALID_SELECTION",
      { ...scope, target: typeName },
    );
  }
  return linkedNodes(ctx, field, scope.id);
}

async function resolveWindow(
  ctx: StoreContext,
  typeName: string,
  rawArgs: unknown,
  scope: ConnectionScope | undefined,
): Promise<Window> {
  const type = getBoundType(ctx.schema, typeName);
  const args = parseListArgs(rawArgs);
  const order = parseOrderBy(type, args.orderBy);
  const condition = compileFilter(ctx.schema, typeName, args.where);

  const matched = await filterNodes(ctx, condition, await candidates(ctx, typeName, scope));
  const sorted = sortNodes(matched, order);
  const total = sorted.length;
  const empty: Window = { nodes: [], total, start: 0, end: 0 };

  let start = 0;
  let end = total;

  if (args.after !== undefined) {
    const index = sorted.findIndex((node) => node.id === args.after);
    if (index === -1) return empty;
    start = index + 1;
  }
  if (args.before !== undefined) {
    const index = sorted.findIndex((node) => node.id === args.before);
    if (index === -1) return empty;
    end = Math.min(end, index);
  }
  if (end < start) return empty;

  if (args.skip !== undefined) {
    if (args.last !== undefined && args.first === undefined) {
      end = Math.max(start, end - args.skip);
    } else {
      start = Math.min(end, start + args.skip);
    }
  }
  if (args.first !== undefined) {
    end = Math.min(end, start + args.first);
  }
  if (args.last !== undefined) {
    start = Math.max(start, end - args.last);
  }

  return { nodes: sorted.slice(start, end), total, start, end };
}

/**
 * Resolves a page of nodes with cursors and the aggregate count.
 *
 * @throws RequestError for malformed arguments
 * @throws SelectorError (INVALID_FILTER) for a malformed filter
 */
export async function resolveConnection(
  ctx: StoreContext,
  typeName: string,
  args: unknown,
  scope?: ConnectionScope,
): Promise<Connection> {
  const window = await resolveWindow(ctx, typeName, args, scope);
  const edges = window.nodes.map((node) => ({ node, cursor: node.id }));
  const first = edges[0];
  const last = edges.at(-1);

  return {
    pageInfo: {
      hasNextPage: edges.length > 0 && window.end < window.total,
      hasPreviousPage: edges.length > 0 && window.start > 0,
      startCursor: first?.cursor ?? null,
      endCursor: last?.cursor ?? null,
    },
    edges,
    aggregate: { count: window.total },
  };
}

/**
 * Resolves a page of nodes without connection metadata.
 */
export async function resolveList(
  ctx: StoreContext,
  typeName: string,
  args: unknown,
  scope?: ConnectionScope,
): Promise<readonly NodeSnapshot[]> {
  const window = await resolveWindow(ctx, typeName, args, scope);
  return window.nodes;
}
