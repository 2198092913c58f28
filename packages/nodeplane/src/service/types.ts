import { type AuthConfig, type AuthMode } from "../auth/gate";
import { type StoreBackend } from "../backend/types";
import { type ErrorPayload } from "../errors/index";
import {
  type ChangeFeedOptions,
  type ChangeListener,
  type SubscribeOptions,
} from "../events/change-feed";
import { type BoundSchema, type OperationAction } from "../schema/types";
import { type IdGenerator } from "../utils/id";

// ============================================================
// Hooks
// ============================================================

/**
 * Base context for all hooks.
 */
export type HookContext = Readonly<{
  /** Unique ID for this operation */
  operationId: string;
  /** Service the operation ran against */
  serviceId: string;
  /** Timestamp when operation started */
  startedAt: Date;
}>;

/**
 * Hook context for a dispatched operation.
 */
export type OperationHookContext = HookContext &
  Readonly<{
    /** Catalog name, e.g. "createUser" */
    operation: string;
    action: OperationAction;
    /** Type the operation works on */
    type: string;
  }>;

/**
 * Observability hooks for monitoring dispatched operations.
 *
 * @example
 * ```typescript
 * const hooks: ServiceHooks = {
 *   onOperationEnd: (ctx, { durationMs }) => {
 *     console.log(`[${ctx.operationId}] ${ctx.operation} in ${durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 * ```
 */
export type ServiceHooks = Readonly<{
  /** Called after the request is admitted and the operation resolved */
  onOperationStart?: (ctx: OperationHookContext) => void;
  /** Called after an operation completes successfully */
  onOperationEnd?: (
    ctx: OperationHookContext,
    result: Readonly<{ durationMs: number }>,
  ) => void;
  /** Called when a request fails, including auth and dispatch failures */
  onError?: (ctx: HookContext, error: Error) => void;
}>;

// ============================================================
// Requests
// ============================================================

/**
 * Field selection: `true` projects a field; an object selects into a
 * relation or connection field, optionally with list arguments.
 */
export type Selection =
  | true
  | Readonly<{
      args?: Readonly<Record<string, unknown>>;
      select?: SelectionSet;
    }>;

export type SelectionSet = Readonly<Record<string, Selection>>;

export type OperationRequest = Readonly<{
  operation: string;
  args?: Readonly<Record<string, unknown>>;
  select?: SelectionSet;
}>;

export type DocumentRequest = Readonly<{
  query: string;
  variables?: Readonly<Record<string, unknown>> | null;
  operationName?: string | null;
}>;

export type ExecuteContext = Readonly<{
  /** Value of the Authorization header */
  authorization?: string;
  /** Aborting rolls a running mutation back */
  signal?: AbortSignal;
}>;

export type ExecutionResult =
  | Readonly<{ data: Readonly<Record<string, unknown>> }>
  | Readonly<{ errors: readonly ErrorPayload[] }>;

// ============================================================
// Service
// ============================================================

export type ServiceOptions = Readonly<{
  schema: BoundSchema;
  backend: StoreBackend;
  /** Required; use `{ mode: "disabled" }` to run without authentication */
  auth: AuthConfig | undefined;
  hooks?: ServiceHooks;
  feed?: ChangeFeedOptions;
  generateId?: IdGenerator;
}>;

export type DataService = Readonly<{
  schema: BoundSchema;
  authMode: AuthMode;
  /**
   * Runs one operation and returns its projected result.
   *
   * @throws NodeplaneError subclasses for every failure
   */
  execute: (request: OperationRequest, context?: ExecuteContext) => Promise<unknown>;
  /**
   * Runs a GraphQL document with one root field.
   */
  executeDocument: (
    request: DocumentRequest,
    context?: ExecuteContext,
  ) => Promise<ExecutionResult>;
  /**
   * Authenticates, then attaches a listener to the change feed.
   *
   * @returns A function that detaches the listener
   * @throws AuthError when the gate rejects the request
   */
  subscribe: (
    type: string,
    listener: ChangeListener,
    options?: SubscribeOptions & ExecuteContext,
  ) => Promise<() => void>;
  close: () => Promise<void>;
}>;
