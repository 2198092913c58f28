/**
 * Request dispatch.
 *
 * A request passes the auth gate, is looked up in the operation catalog,
 * has its arguments validated and is then handed to the selector, the
 * mutation executor or the connection resolver. Results are projected by
 * the request's selection inside the same transaction that produced them.
 *
 * @example
 * ```typescript
 * const service = createService({
 *   schema: bindSchema({ id: "shop@dev", types: [User, Post] }),
 *   backend,
 *   auth: { mode: "secret", secrets: [process.env.NODEPLANE_SECRET] },
 * });
 *
 * const user = await service.execute(
 *   { operation: "createUser", args: { data: { name: "Sarah" } } },
 *   { authorization: `Bearer ${token}` },
 * );
 * ```
 */
import { createAuthGate } from "../auth/gate";
import { resolveConnection, resolveList } from "../connection/resolver";
import { RequestError, toErrorPayload } from "../errors/index";
import { createChangeFeed } from "../events/change-feed";
import {
  createMutationExecutor,
  createOne,
  deleteOne,
  updateOne,
  upsertOne,
} from "../mutation/executor";
import { type OperationDescriptor } from "../schema/types";
import { findUnique, selectUnique } from "../selector/node-selector";
import { type StoreContext } from "../store/types";
import { generateId } from "../utils/id";
import { unwrap } from "../utils/result";
import { documentToRequest } from "./graphql";
import { projectConnection, projectNode, projectRecord } from "./projection";
import {
  createArgsSchema,
  deleteManyArgsSchema,
  lookupOperation,
  parseArgs,
  updateArgsSchema,
  updateManyArgsSchema,
  uniqueArgsSchema,
  upsertArgsSchema,
} from "./request";
import {
  type DataService,
  type ExecuteContext,
  type HookContext,
  type OperationHookContext,
  type OperationRequest,
  type ServiceOptions,
} from "./types";

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Creates a data service over a bound schema and a store backend.
 *
 * @throws ConfigurationError when `auth` is missing or unusable
 */
export function createService(options: ServiceOptions): DataService {
  const { schema, backend } = options;
  const hooks = options.hooks ?? {};
  const gate = createAuthGate(options.auth);
  const feed = createChangeFeed(options.feed);
  const executor = createMutationExecutor({
    schema,
    backend,
    feed,
    ...(options.generateId !== undefined && { generateId: options.generateId }),
  });

  // ============================================================
  // Hooks
  // ============================================================

  function createHookContext(): HookContext {
    return {
      operationId: generateId(),
      serviceId: schema.id,
      startedAt: new Date(),
    };
  }

  async function withOperationHooks<T>(
    ctx: OperationHookContext,
    fn: () => Promise<T>,
  ): Promise<T> {
    hooks.onOperationStart?.(ctx);
    const startTime = Date.now();
    try {
      const result = await fn();
      hooks.onOperationEnd?.(ctx, { durationMs: Date.now() - startTime });
      return result;
    } catch (error) {
      hooks.onError?.(ctx, toError(error));
      throw error;
    }
  }

  function reportingErrors<T>(ctx: HookContext, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      hooks.onError?.(ctx, toError(error));
      throw error;
    }
  }

  async function admit(ctx: HookContext, context: ExecuteContext): Promise<void> {
    const result = await gate.authenticate(context.authorization);
    reportingErrors(ctx, () => unwrap(result));
  }

  // ============================================================
  // Dispatch
  // ============================================================

  async function read<T>(fn: (ctx: StoreContext) => Promise<T>): Promise<T> {
    return backend.transaction((tx) => fn({ schema, backend: tx }));
  }

  async function dispatch(
    descriptor: OperationDescriptor,
    request: OperationRequest,
    context: ExecuteContext,
  ): Promise<unknown> {
    const { name, type } = descriptor;
    const { select } = request;
    const mutationOptions = {
      operation: name,
      ...(context.signal !== undefined && { signal: context.signal }),
    };

    switch (descriptor.action) {
      case "findUnique": {
        const { where } = parseArgs(uniqueArgsSchema, request.args, name);
        return read(async (ctx) => {
          const node = await findUnique(ctx, type, where);
          return node === undefined ? null : projectNode(ctx, type, node, select, name);
        });
      }

      case "findMany": {
        return read(async (ctx) => {
          const nodes = await resolveList(ctx, type, request.args);
          const projected: unknown[] = [];
          for (const node of nodes) {
            projected.push(await projectNode(ctx, type, node, select, name));
          }
          return projected;
        });
      }

      case "connection": {
        return read(async (ctx) =>
          projectConnection(
            ctx,
            type,
            await resolveConnection(ctx, type, request.args),
            select,
            name,
          ),
        );
      }

      case "create": {
        const { data } = parseArgs(createArgsSchema, request.args, name);
        return executor.transaction(
          name,
          async (ctx) => projectNode(ctx, type, await createOne(ctx, type, data), select, name),
          mutationOptions,
        );
      }

      case "update": {
        const { where, data } = parseArgs(updateArgsSchema, request.args, name);
        return executor.transaction(
          name,
          async (ctx) =>
            projectNode(ctx, type, await updateOne(ctx, type, where, data), select, name),
          mutationOptions,
        );
      }

      case "upsert": {
        const args = parseArgs(upsertArgsSchema, request.args, name);
        return executor.transaction(
          name,
          async (ctx) => projectNode(ctx, type, await upsertOne(ctx, type, args), select, name),
          mutationOptions,
        );
      }

      case "delete": {
        const { where } = parseArgs(uniqueArgsSchema, request.args, name);
        return executor.transaction(
          name,
          async (ctx) => {
            const node = await selectUnique(ctx, type, where);
            const projected = await projectNode(ctx, type, node, select, name);
            await deleteOne(ctx, type, { id: node.id });
            return projected;
          },
          mutationOptions,
        );
      }

      case "updateMany": {
        const { where, data } = parseArgs(updateManyArgsSchema, request.args, name);
        const result = await executor.updateMany(type, where, data, mutationOptions);
        return projectRecord(result, select, name);
      }

      case "deleteMany": {
        const { where } = parseArgs(deleteManyArgsSchema, request.args, name);
        const result = await executor.deleteMany(type, where, mutationOptions);
        return projectRecord(result, select, name);
      }
    }
  }

  async function run(
    base: HookContext,
    request: OperationRequest,
    context: ExecuteContext,
    expectedKind?: OperationDescriptor["kind"],
  ): Promise<unknown> {
    const descriptor = reportingErrors(base, () => {
      const found = lookupOperation(schema, request.operation);
      if (expectedKind !== undefined && found.kind !== expectedKind) {
        throw new RequestError(
          `"${found.name}" is a ${found.kind}, not a ${expectedKind}`,
          "INVALID_DOCUMENT",
          { operation: found.name },
        );
      }
      return found;
    });

    return withOperationHooks(
      {
        ...base,
        operation: descriptor.name,
        action: descriptor.action,
        type: descriptor.type,
      },
      () => dispatch(descriptor, request, context),
    );
  }

  // ============================================================
  // Service
  // ============================================================

  return {
    schema,
    authMode: gate.mode,

    async execute(request, context = {}) {
      const base = createHookContext();
      await admit(base, context);
      return run(base, request, context);
    },

    async executeDocument(request, context = {}) {
      const base = createHookContext();
      try {
        await admit(base, context);
        const document = reportingErrors(base, () => documentToRequest(request));
        const value = await run(base, document.request, context, document.kind);
        return { data: { [document.responseKey]: value } };
      } catch (error) {
        return { errors: [toErrorPayload(error)] };
      }
    },

    async subscribe(type, listener, subscribeOptions = {}) {
      const base = createHookContext();
      await admit(base, subscribeOptions);
      reportingErrors(base, () => {
        if (!schema.types.has(type)) {
          throw new RequestError(`Unknown type "${type}"`, "INVALID_ARGUMENTS", {
            type,
            available: [...schema.types.keys()],
          });
        }
      });
      return feed.subscribe(
        type,
        listener,
        subscribeOptions.mutationIn === undefined ?
          {}
        : { mutationIn: subscribeOptions.mutationIn },
      );
    },

    async close() {
      await backend.close();
    },
  };
}
