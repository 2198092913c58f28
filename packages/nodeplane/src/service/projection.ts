/**
 * Result projection: shapes nodes, connections and batch results by a
 * selection set. Relation fields are resolved against the same store
 * context, so a mutation's result is read inside its own transaction.
 */
import { type Connection, resolveList } from "../connection/resolver";
import { type NodeSnapshot } from "../core/types";
import { RequestError } from "../errors/index";
import { getBoundType } from "../schema/binder";
import { type BoundRelationField, type BoundType } from "../schema/types";
import { findUnique } from "../selector/node-selector";
import { linkedIds } from "../store/links";
import { type StoreContext } from "../store/types";
import { type Selection, type SelectionSet } from "./types";

type Projected = Record<string, unknown>;

function selectionError(path: string, message: string): RequestError {
  return new RequestError(
    `Invalid selection "${path}": ${message}`,
    "INVALID_SELECTION",
    { path },
  );
}

function subSelection(selection: Selection): SelectionSet | undefined {
  return selection === true ? undefined : selection.select;
}

function selectionArgs(selection: Selection): Readonly<Record<string, unknown>> | undefined {
  return selection === true ? undefined : selection.args;
}

// ============================================================
// Plain Records
// ============================================================

/**
 * Projects a plain record such as `pageInfo` or `{ count }`.
 */
export function projectRecord(
  value: Readonly<Record<string, unknown>>,
  select: SelectionSet | undefined,
  path: string,
): Projected {
  if (select === undefined) return { ...value };

  const result: Projected = {};
  for (const [key, selection] of Object.entries(select)) {
    if (!(key in value)) {
      throw selectionError(`${path}.${key}`, "unknown field");
    }
    if (selection !== true && selection.select !== undefined) {
      throw selectionError(`${path}.${key}`, "field has no sub-fields");
    }
    result[key] = value[key];
  }
  return result;
}

// ============================================================
// Nodes
// ============================================================

function defaultNodeProjection(type: BoundType, node: NodeSnapshot): Projected {
  const result: Projected = {};
  for (const field of type.scalarFields) {
    result[field.name] = node[field.name] ?? null;
  }
  return result;
}

async function projectRelation(
  ctx: StoreContext,
  type: BoundType,
  field: BoundRelationField,
  node: NodeSnapshot,
  selection: Selection,
  path: string,
): Promise<unknown> {
  const select = subSelection(selection);

  if (field.list) {
    const related = await resolveList(ctx, field.target, selectionArgs(selection), {
      type: type.name,
      id: node.id,
      field: field.name,
    });
    const projected: Projected[] = [];
    for (const item of related) {
      projected.push(await projectNode(ctx, field.target, item, select, path));
    }
    return projected;
  }

  if (selectionArgs(selection) !== undefined) {
    throw selectionError(path, "single relations take no arguments");
  }
  const [id] = await linkedIds(ctx, field, node.id);
  if (id === undefined) return null;
  const related = await findUnique(ctx, field.target, { id });
  return related === undefined ?
      null
    : projectNode(ctx, field.target, related, select, path);
}

/**
 * Projects a node. Without a selection every scalar and system field is
 * returned.
 *
 * @throws RequestError (INVALID_SELECTION)
 */
export async function projectNode(
  ctx: StoreContext,
  typeName: string,
  node: NodeSnapshot,
  select: SelectionSet | undefined,
  path: string = typeName,
): Promise<Projected> {
  const type = getBoundType(ctx.schema, typeName);
  if (select === undefined) return defaultNodeProjection(type, node);

  const result: Projected = {};
  for (const [key, selection] of Object.entries(select)) {
    const fieldPath = `${path}.${key}`;
    if (key === "__typename") {
      result[key] = typeName;
      continue;
    }

    const field = type.fields.get(key);
    if (field === undefined) {
      throw selectionError(fieldPath, `${typeName} has no field "${key}"`);
    }

    if (field.kind === "scalar") {
      if (selection !== true && (selection.select !== undefined || selection.args !== undefined)) {
        throw selectionError(fieldPath, "scalar fields take no arguments or sub-fields");
      }
      result[key] = node[key] ?? null;
      continue;
    }

    result[key] = await projectRelation(ctx, type, field, node, selection, fieldPath);
  }
  return result;
}

// ============================================================
// Connections
// ============================================================

/**
 * Projects a connection: `pageInfo`, `edges { cursor node }` and
 * `aggregate { count }`.
 *
 * @throws RequestError (INVALID_SELECTION)
 */
export async function projectConnection(
  ctx: StoreContext,
  typeName: string,
  connection: Connection,
  select: SelectionSet | undefined,
  path: string,
): Promise<Projected> {
  const effective: SelectionSet = select ?? {
    pageInfo: true,
    edges: true,
    aggregate: true,
  };

  const result: Projected = {};
  for (const [key, selection] of Object.entries(effective)) {
    const fieldPath = `${path}.${key}`;
    switch (key) {
      case "__typename": {
        result[key] = `${typeName}Connection`;
        break;
      }
      case "pageInfo": {
        result[key] = projectRecord(connection.pageInfo, subSelection(selection), fieldPath);
        break;
      }
      case "aggregate": {
        result[key] = projectRecord(connection.aggregate, subSelection(selection), fieldPath);
        break;
      }
      case "edges": {
        const edgeSelect = subSelection(selection);
        const edges: Projected[] = [];
        for (const edge of connection.edges) {
          edges.push(await projectEdge(ctx, typeName, edge, edgeSelect, fieldPath));
        }
        result[key] = edges;
        break;
      }
      default: {
        throw selectionError(fieldPath, "connections have pageInfo, edges and aggregate");
      }
    }
  }
  return result;
}

async function projectEdge(
  ctx: StoreContext,
  typeName: string,
  edge: Connection["edges"][number],
  select: SelectionSet | undefined,
  path: string,
): Promise<Projected> {
  const effective: SelectionSet = select ?? { node: true, cursor: true };
  const result: Projected = {};
  for (const [key, selection] of Object.entries(effective)) {
    if (key === "cursor") {
      result[key] = edge.cursor;
    } else if (key === "node") {
      result[key] = await projectNode(
        ctx,
        typeName,
        edge.node,
        subSelection(selection),
        `${path}.node`,
      );
    } else if (key === "__typename") {
      result[key] = `${typeName}Edge`;
    } else {
      throw selectionError(`${path}.${key}`, "edges have cursor and node");
    }
  }
  return result;
}
