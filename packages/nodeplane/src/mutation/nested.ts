/**
 * Node writes with nested relation sub-actions.
 *
 * Data for a create or update is an object of scalar values and relation
 * fields. A relation field carries an object of sub-actions that run in
 * key order; list fields take an array (or one item) per sub-action.
 *
 * @example
 * ```typescript
 * await createNode(ctx, "User", {
 *   name: "Sarah",
 *   posts: {
 *     create: [{ title: "Join us" }],
 *     connect: [{ id: "cjk1e3t7i1ark0b299pvrge5m" }],
 *   },
 * });
 * ```
 */
import { type NodeSnapshot } from "../core/types";
import { MissingNodeError, SelectorError } from "../errors/index";
import { createValidationError, validateNodeProps } from "../errors/validation";
import { getBoundType } from "../schema/binder";
import { type BoundRelationField, type BoundType } from "../schema/types";
import { scalarValueSchema } from "../schema/values";
import { findUnique, selectUnique } from "../selector/node-selector";
import { linkedIds } from "../store/links";
import { insertNode, updateNode } from "../store/nodes";
import { snapshotProps } from "../store/row-mappers";
import { deleteWithCascade } from "./cascade";
import { type MutationContext, throwIfAborted } from "./context";
import { linkNodes, unlinkNodes } from "./links";

// ============================================================
// Shape Helpers
// ============================================================

type WriteOperation = "create" | "update";

const CREATE_ACTIONS = new Set(["create", "connect"]);

const UPDATE_ACTIONS = new Set([
  "create",
  "connect",
  "disconnect",
  "delete",
  "update",
  "upsert",
  "set",
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function joinPath(...parts: readonly (string | number)[]): string {
  return parts.filter((part) => part !== "").join(".");
}

function asItems(value: unknown): readonly unknown[] {
  return Array.isArray(value) ? value : [value];
}

function shapeError(
  type: string,
  operation: WriteOperation,
  path: string,
  message: string,
) {
  return createValidationError(
    `Invalid data for ${type} at "${path || "(root)"}": ${message}`,
    [{ path, message }],
    { type, operation },
  );
}

function expectRecord(
  value: unknown,
  type: string,
  operation: WriteOperation,
  path: string,
): Record<string, unknown> {
  if (!isRecord(value)) {
    throw shapeError(type, operation, path, "expected an object");
  }
  return value;
}

type SplitData = Readonly<{
  scalars: Record<string, unknown>;
  relations: readonly (readonly [BoundRelationField, unknown])[];
  id: unknown;
}>;

/**
 * Separates scalar values from relation sub-actions. System fields other
 * than a create's `id` are rejected; unknown keys are left to the props
 * schema.
 */
function splitData(
  type: BoundType,
  data: Record<string, unknown>,
  operation: WriteOperation,
  path: string,
  excluded: string | undefined,
): SplitData {
  const scalars: Record<string, unknown> = {};
  const relations: (readonly [BoundRelationField, unknown])[] = [];
  let id: unknown;

  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    const field = type.fields.get(key);

    if (field?.kind === "relation") {
      if (key === excluded) {
        throw shapeError(
          type.name,
          operation,
          joinPath(path, key),
          `"${key}" is set by the enclosing nested write`,
        );
      }
      relations.push([field, value]);
      continue;
    }

    if (field?.system === true) {
      if (key === "id" && operation === "create") {
        id = value;
        continue;
      }
      throw shapeError(
        type.name,
        operation,
        joinPath(path, key),
        `"${key}" is maintained by the store`,
      );
    }

    scalars[key] = value;
  }

  return { scalars, relations, id };
}

function parseProvidedId(
  type: BoundType,
  value: unknown,
  path: string,
): string | undefined {
  if (value === undefined) return undefined;
  const parsed = scalarValueSchema("ID", undefined).safeParse(value);
  if (!parsed.success || typeof parsed.data !== "string") {
    throw shapeError(
      type.name,
      "create",
      joinPath(path, "id"),
      "expected a non-empty string",
    );
  }
  return parsed.data;
}

function describeWhere(where: unknown): Record<string, unknown> {
  return isRecord(where) ? where : {};
}

// ============================================================
// Nested Targets
// ============================================================

/**
 * Resolves the unique selector of a nested sub-action. A miss rolls the
 * mutation back as a MissingNodeError.
 */
async function resolveTarget(
  ctx: MutationContext,
  field: BoundRelationField,
  where: unknown,
  path: string,
): Promise<NodeSnapshot> {
  try {
    return await selectUnique(ctx, field.target, where);
  } catch (error) {
    if (!(error instanceof SelectorError)) throw error;
    if (error.code === "NODE_NOT_FOUND") {
      throw new MissingNodeError(
        `No ${field.target} found for "${path}"`,
        { type: field.target, field: field.name, where: describeWhere(where) },
        { cause: error },
      );
    }
    throw createValidationError(
      error.message,
      [{ path, message: error.message }],
      { type: field.target },
    );
  }
}

/**
 * Resolves a nested selector that must name a node already linked to the
 * holder through `field`.
 */
async function resolveLinkedTarget(
  ctx: MutationContext,
  field: BoundRelationField,
  holderId: string,
  where: unknown,
  path: string,
): Promise<NodeSnapshot> {
  const target = await resolveTarget(ctx, field, where, path);
  const linked = await linkedIds(ctx, field, holderId);
  if (!linked.includes(target.id)) {
    throw new MissingNodeError(
      `${field.target} ${target.id} is not linked through "${field.name}"`,
      { type: field.target, field: field.name, where: describeWhere(where) },
    );
  }
  return target;
}

async function currentSingleTarget(
  ctx: MutationContext,
  field: BoundRelationField,
  holderId: string,
): Promise<NodeSnapshot | undefined> {
  const [id] = await linkedIds(ctx, field, holderId);
  if (id === undefined) return undefined;
  return findUnique(ctx, field.target, { id });
}

function missingSingle(
  field: BoundRelationField,
  holderType: BoundType,
  holderId: string,
): MissingNodeError {
  return new MissingNodeError(
    `${holderType.name} ${holderId} has no ${field.target} linked through "${field.name}"`,
    { type: field.target, field: field.name, where: {} },
  );
}

// ============================================================
// Create
// ============================================================

export type CreateNodeOptions = Readonly<{
  path?: string;
  /** Relation field filled in by the enclosing nested write */
  excluded?: string;
}>;

/**
 * Creates a node and runs its nested `create` and `connect` sub-actions.
 */
export async function createNode(
  ctx: MutationContext,
  typeName: string,
  data: unknown,
  options: CreateNodeOptions = {},
): Promise<NodeSnapshot> {
  throwIfAborted(ctx);
  const path = options.path ?? "";
  const type = getBoundType(ctx.schema, typeName);
  const record = expectRecord(data, typeName, "create", path);
  const { scalars, relations, id } = splitData(
    type,
    record,
    "create",
    path,
    options.excluded,
  );

  const props = validateNodeProps(type.propsSchema, scalars, {
    type: typeName,
    operation: "create",
    path,
  });
  const nodeId = parseProvidedId(type, id, path) ?? ctx.generateId();

  const node = await insertNode(ctx, type, nodeId, props, ctx.timestamp);
  ctx.unit.touch(typeName, nodeId);
  ctx.unit.record({
    mutation: "CREATED",
    type: typeName,
    node,
    previousValues: null,
    updatedFields: null,
  });

  for (const [field, value] of relations) {
    await applyRelationWrites(ctx, type, field, nodeId, value, {
      operation: "create",
      path: joinPath(path, field.name),
    });
  }

  return node;
}

// ============================================================
// Update
// ============================================================

/**
 * Writes new scalar values to an existing node, then runs its nested
 * sub-actions. `updatedAt` moves even when no scalar changes.
 */
export async function updateNodeWith(
  ctx: MutationContext,
  typeName: string,
  previous: NodeSnapshot,
  data: unknown,
  path = "",
): Promise<NodeSnapshot> {
  throwIfAborted(ctx);
  const type = getBoundType(ctx.schema, typeName);
  const record = expectRecord(data, typeName, "update", path);
  const { scalars, relations } = splitData(
    type,
    record,
    "update",
    path,
    undefined,
  );

  const props = validateNodeProps(
    type.propsSchema,
    { ...snapshotProps(type, previous), ...scalars },
    { type: typeName, operation: "update", id: previous.id, path },
  );

  const node = await updateNode(ctx, type, previous, props, ctx.timestamp);
  ctx.unit.touch(typeName, previous.id);
  ctx.unit.record({
    mutation: "UPDATED",
    type: typeName,
    node,
    previousValues: previous,
    updatedFields: Object.keys(scalars),
  });

  for (const [field, value] of relations) {
    await applyRelationWrites(ctx, type, field, previous.id, value, {
      operation: "update",
      path: joinPath(path, field.name),
    });
  }

  return node;
}

// ============================================================
// Relation Sub-actions
// ============================================================

type RelationWriteContext = Readonly<{
  operation: WriteOperation;
  path: string;
}>;

async function applyRelationWrites(
  ctx: MutationContext,
  holderType: BoundType,
  field: BoundRelationField,
  holderId: string,
  value: unknown,
  write: RelationWriteContext,
): Promise<void> {
  const actions = expectRecord(value, holderType.name, write.operation, write.path);
  const allowed = write.operation === "create" ? CREATE_ACTIONS : UPDATE_ACTIONS;

  for (const [action, argument] of Object.entries(actions)) {
    if (argument === undefined) continue;
    const path = joinPath(write.path, action);
    if (!allowed.has(action)) {
      throw shapeError(
        holderType.name,
        write.operation,
        path,
        `unknown nested action; expected one of ${[...allowed].join(", ")}`,
      );
    }
    throwIfAborted(ctx);

    const target: NestedTarget = { ctx, holderType, field, holderId, path };
    if (field.list) {
      await applyListAction(target, action, argument, write.operation);
    } else {
      await applySingleAction(target, action, argument, write.operation);
    }
  }
}

type NestedTarget = Readonly<{
  ctx: MutationContext;
  holderType: BoundType;
  field: BoundRelationField;
  holderId: string;
  path: string;
}>;

async function createAndLink(target: NestedTarget, data: unknown, path: string) {
  const { ctx, holderType, field, holderId } = target;
  const child = await createNode(ctx, field.target, data, {
    path,
    ...(field.opposite !== undefined && { excluded: field.opposite.field }),
  });
  await linkNodes(ctx, holderType.name, field, holderId, child.id);
}

async function applyListAction(
  target: NestedTarget,
  action: string,
  argument: unknown,
  operation: WriteOperation,
): Promise<void> {
  const { ctx, holderType, field, holderId } = target;
  const items = asItems(argument);

  if (action === "set") {
    const keep: string[] = [];
    for (const [index, where] of items.entries()) {
      const node = await resolveTarget(ctx, field, where, joinPath(target.path, index));
      keep.push(node.id);
    }
    for (const id of await linkedIds(ctx, field, holderId)) {
      if (!keep.includes(id)) await unlinkNodes(ctx, holderType.name, field, holderId, id);
    }
    for (const id of keep) {
      await linkNodes(ctx, holderType.name, field, holderId, id);
    }
    return;
  }

  for (const [index, item] of items.entries()) {
    throwIfAborted(ctx);
    const path = joinPath(target.path, index);

    switch (action) {
      case "create": {
        await createAndLink(target, item, path);
        break;
      }
      case "connect": {
        const node = await resolveTarget(ctx, field, item, path);
        await linkNodes(ctx, holderType.name, field, holderId, node.id);
        break;
      }
      case "disconnect": {
        const node = await resolveLinkedTarget(ctx, field, holderId, item, path);
        await unlinkNodes(ctx, holderType.name, field, holderId, node.id);
        break;
      }
      case "delete": {
        const node = await resolveLinkedTarget(ctx, field, holderId, item, path);
        await deleteWithCascade(ctx, field.target, node.id);
        break;
      }
      case "update": {
        const args = expectRecord(item, holderType.name, operation, path);
        const node = await resolveLinkedTarget(
          ctx,
          field,
          holderId,
          args.where,
          joinPath(path, "where"),
        );
        await updateNodeWith(ctx, field.target, node, args.data, joinPath(path, "data"));
        break;
      }
      case "upsert": {
        const args = expectRecord(item, holderType.name, operation, path);
        const linked = await linkedIds(ctx, field, holderId);
        const existing = await findNestedUnique(target, args.where, joinPath(path, "where"));
        if (existing !== undefined && linked.includes(existing.id)) {
          await updateNodeWith(ctx, field.target, existing, args.update, joinPath(path, "update"));
        } else {
          await createAndLink(target, args.create, joinPath(path, "create"));
        }
        break;
      }
    }
  }
}

async function findNestedUnique(
  target: NestedTarget,
  where: unknown,
  path: string,
): Promise<NodeSnapshot | undefined> {
  try {
    return await findUnique(target.ctx, target.field.target, where);
  } catch (error) {
    if (!(error instanceof SelectorError)) throw error;
    throw createValidationError(
      error.message,
      [{ path, message: error.message }],
      { type: target.field.target },
    );
  }
}

async function applySingleAction(
  target: NestedTarget,
  action: string,
  argument: unknown,
  operation: WriteOperation,
): Promise<void> {
  const { ctx, holderType, field, holderId, path } = target;

  switch (action) {
    case "create": {
      await createAndLink(target, argument, path);
      return;
    }
    case "connect": {
      const node = await resolveTarget(ctx, field, argument, path);
      await linkNodes(ctx, holderType.name, field, holderId, node.id);
      return;
    }
    case "disconnect": {
      expectTrue(holderType, operation, path, argument);
      const current = await currentSingleTarget(ctx, field, holderId);
      if (current !== undefined) {
        await unlinkNodes(ctx, holderType.name, field, holderId, current.id);
      }
      return;
    }
    case "delete": {
      expectTrue(holderType, operation, path, argument);
      const current = await currentSingleTarget(ctx, field, holderId);
      if (current === undefined) throw missingSingle(field, holderType, holderId);
      await deleteWithCascade(ctx, field.target, current.id);
      return;
    }
    case "update": {
      const current = await currentSingleTarget(ctx, field, holderId);
      if (current === undefined) throw missingSingle(field, holderType, holderId);
      await updateNodeWith(ctx, field.target, current, argument, path);
      return;
    }
    case "upsert": {
      const args = expectRecord(argument, holderType.name, operation, path);
      const current = await currentSingleTarget(ctx, field, holderId);
      if (current === undefined) {
        await createAndLink(target, args.create, joinPath(path, "create"));
      } else {
        await updateNodeWith(ctx, field.target, current, args.update, joinPath(path, "update"));
      }
      return;
    }
    default: {
      throw shapeError(
        holderType.name,
        operation,
        path,
        `"${action}" is only available on list relations`,
      );
    }
  }
}

function expectTrue(
  holderType: BoundType,
  operation: WriteOperation,
  path: string,
  argument: unknown,
): void {
  if (argument !== true) {
    throw shapeError(holderType.name, operation, path, "expected true");
  }
}
