/**
 * Mutation Executor
 *
 * Runs each mutation as one all-or-nothing unit inside a backend
 * transaction. Change events collected along the way are published only
 * after the transaction commits.
 *
 * @example
 * ```typescript
 * const executor = createMutationExecutor({ schema, backend, feed });
 *
 * const user = await executor.create("User", {
 *   name: "Sarah",
 *   posts: { create: [{ title: "Hello" }] },
 * });
 *
 * const { count } = await executor.deleteMany("User", {
 *   email_in: ["a@example.com", "b@example.com"],
 * });
 * ```
 */
import { type StoreBackend } from "../backend/types";
import { type NodeSnapshot } from "../core/types";
import { isNodeplaneError, MutationError, RequiredRelationError } from "../errors/index";
import { createValidationError, validateNodeProps } from "../errors/validation";
import { type ChangeFeed } from "../events/change-feed";
import { getBoundType } from "../schema/binder";
import { type BoundSchema } from "../schema/types";
import { findUnique, selectMany, selectUnique } from "../selector/node-selector";
import { linkedIds } from "../store/links";
import { updateNode } from "../store/nodes";
import { snapshotProps } from "../store/row-mappers";
import { nowIso } from "../utils/date";
import { generateId, type IdGenerator } from "../utils/id";
import { deleteWithCascade } from "./cascade";
import { type MutationContext, throwIfAborted } from "./context";
import { createNode, isRecord, updateNodeWith } from "./nested";
import { UnitOfWork } from "./unit-of-work";

// ============================================================
// Types
// ============================================================

export type BatchResult = Readonly<{ count: number }>;

export type MutationOptions = Readonly<{
  /** Aborting rolls the mutation back */
  signal?: AbortSignal;
  /** Name reported in errors (defaults to the executor method) */
  operation?: string;
}>;

export type TransactionOptions = MutationOptions &
  Readonly<{
    /** Batch mutations run without change events */
    emitEvents?: boolean;
  }>;

export type MutationExecutorOptions = Readonly<{
  schema: BoundSchema;
  backend: StoreBackend;
  /** Receives change events after commit */
  feed?: ChangeFeed;
  generateId?: IdGenerator;
  now?: () => string;
}>;

export type MutationExecutor = Readonly<{
  create: (
    typeName: string,
    data: unknown,
    options?: MutationOptions,
  ) => Promise<NodeSnapshot>;
  update: (
    typeName: string,
    where: unknown,
    data: unknown,
    options?: MutationOptions,
  ) => Promise<NodeSnapshot>;
  upsert: (
    typeName: string,
    args: UpsertArgs,
    options?: MutationOptions,
  ) => Promise<NodeSnapshot>;
  delete: (
    typeName: string,
    where: unknown,
    options?: MutationOptions,
  ) => Promise<NodeSnapshot>;
  updateMany: (
    typeName: string,
    where: unknown,
    data: unknown,
    options?: MutationOptions,
  ) => Promise<BatchResult>;
  deleteMany: (
    typeName: string,
    where: unknown,
    options?: MutationOptions,
  ) => Promise<BatchResult>;
  /**
   * Runs `body` as one mutation. Used by callers that read inside the same
   * transaction, such as result projection.
   */
  transaction: <T>(
    operation: string,
    body: (ctx: MutationContext) => Promise<T>,
    options?: TransactionOptions,
  ) => Promise<T>;
}>;

export type UpsertArgs = Readonly<{
  where: unknown;
  create: unknown;
  update: unknown;
}>;

// ============================================================
// Top-level Mutations
// ============================================================

export async function createOne(
  ctx: MutationContext,
  typeName: string,
  data: unknown,
): Promise<NodeSnapshot> {
  return createNode(ctx, typeName, data);
}

/**
 * @throws SelectorError when `where` matches nothing
 */
export async function updateOne(
  ctx: MutationContext,
  typeName: string,
  where: unknown,
  data: unknown,
): Promise<NodeSnapshot> {
  const node = await selectUnique(ctx, typeName, where);
  return updateNodeWith(ctx, typeName, node, data);
}

export async function upsertOne(
  ctx: MutationContext,
  typeName: string,
  args: UpsertArgs,
): Promise<NodeSnapshot> {
  const existing = await findUnique(ctx, typeName, args.where);
  return existing === undefined ?
      createNode(ctx, typeName, args.create, { path: "create" })
    : updateNodeWith(ctx, typeName, existing, args.update, "update");
}

/**
 * Deletes the selected node and its cascade.
 *
 * @returns The selected node as it was before deletion
 * @throws SelectorError when `where` matches nothing
 */
export async function deleteOne(
  ctx: MutationContext,
  typeName: string,
  where: unknown,
): Promise<NodeSnapshot> {
  const node = await selectUnique(ctx, typeName, where);
  await deleteWithCascade(ctx, typeName, node.id);
  return node;
}

/**
 * Writes the same scalar values to every node matching a filter.
 */
export async function updateManyNodes(
  ctx: MutationContext,
  typeName: string,
  where: unknown,
  data: unknown,
): Promise<BatchResult> {
  const type = getBoundType(ctx.schema, typeName);
  const matched = await selectMany(ctx, typeName, where);

  if (!isRecord(data)) {
    throw createValidationError(
      `Invalid data for ${typeName}: expected an object`,
      [{ path: "", message: "expected an object" }],
      { type: typeName, operation: "update" },
    );
  }
  for (const key of Object.keys(data)) {
    const field = type.fields.get(key);
    if (field?.kind === "relation" || field?.system === true) {
      throw createValidationError(
        `"${key}" cannot be written by a batch update of ${typeName}`,
        [{ path: key, message: "batch updates take scalar fields only" }],
        { type: typeName, operation: "update" },
      );
    }
  }

  const patch = validateNodeProps(type.patchSchema, data, {
    type: typeName,
    operation: "update",
  });

  for (const node of matched) {
    throwIfAborted(ctx);
    const props = validateNodeProps(
      type.propsSchema,
      { ...snapshotProps(type, node), ...patch },
      { type: typeName, operation: "update", id: node.id },
    );
    await updateNode(ctx, type, node, props, ctx.timestamp);
  }

  return { count: matched.length };
}

/**
 * Deletes every node matching a filter, with cascades.
 */
export async function deleteManyNodes(
  ctx: MutationContext,
  typeName: string,
  where: unknown,
): Promise<BatchResult> {
  const matched = await selectMany(ctx, typeName, where);
  for (const node of matched) {
    if (ctx.unit.isDeleted(typeName, node.id)) continue;
    await deleteWithCascade(ctx, typeName, node.id);
  }
  return { count: matched.length };
}

// ============================================================
// Commit Checks
// ============================================================

/**
 * Fails the mutation if a surviving touched node has an empty required
 * single relation.
 */
async function checkRequiredRelations(ctx: MutationContext): Promise<void> {
  for (const ref of ctx.unit.surviving()) {
    const type = getBoundType(ctx.schema, ref.type);
    for (const field of type.relationFields) {
      if (!field.required || field.list) continue;
      const linked = await linkedIds(ctx, field, ref.id);
      if (linked.length === 0) {
        throw new RequiredRelationError({
          type: ref.type,
          id: ref.id,
          field: field.name,
        });
      }
    }
  }
}

function toMutationError(operation: string, error: unknown): Error {
  if (isNodeplaneError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new MutationError(`Mutation "${operation}" failed: ${message}`, "MUTATION_FAILED", {
    category: "system",
    cause: error,
  });
}

// ============================================================
// Factory
// ============================================================

export function createMutationExecutor(
  options: MutationExecutorOptions,
): MutationExecutor {
  const { schema, backend, feed } = options;
  const nextId = options.generateId ?? generateId;
  const now = options.now ?? nowIso;

  async function transaction<T>(
    operation: string,
    body: (ctx: MutationContext) => Promise<T>,
    transactionOptions: TransactionOptions = {},
  ): Promise<T> {
    const unit = new UnitOfWork({
      recordEvents: transactionOptions.emitEvents ?? true,
    });
    const name = transactionOptions.operation ?? operation;

    const result = await backend
      .transaction(async (tx) => {
        const ctx: MutationContext = {
          schema,
          backend: tx,
          unit,
          operation: name,
          signal: transactionOptions.signal,
          timestamp: now(),
          generateId: nextId,
        };
        throwIfAborted(ctx);
        const value = await body(ctx);
        await checkRequiredRelations(ctx);
        throwIfAborted(ctx);
        return value;
      })
      .catch((error: unknown) => {
        throw toMutationError(name, error);
      });

    feed?.publish(unit.events);
    return result;
  }

  return {
    transaction,

    create: (typeName, data, mutationOptions) =>
      transaction("create", (ctx) => createOne(ctx, typeName, data), mutationOptions),

    update: (typeName, where, data, mutationOptions) =>
      transaction(
        "update",
        (ctx) => updateOne(ctx, typeName, where, data),
        mutationOptions,
      ),

    upsert: (typeName, args, mutationOptions) =>
      transaction("upsert", (ctx) => upsertOne(ctx, typeName, args), mutationOptions),

    delete: (typeName, where, mutationOptions) =>
      transaction("delete", (ctx) => deleteOne(ctx, typeName, where), mutationOptions),

    updateMany: (typeName, where, data, mutationOptions) =>
      transaction(
        "updateMany",
        (ctx) => updateManyNodes(ctx, typeName, where, data),
        { ...mutationOptions, emitEvents: false },
      ),

    deleteMany: (typeName, where, mutationOptions) =>
      transaction(
        "deleteMany",
        (ctx) => deleteManyNodes(ctx, typeName, where),
        { ...mutationOptions, emitEvents: false },
      ),
  };
}
