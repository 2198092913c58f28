/**
 * Nodeplane: a CRUD and realtime data API over a declared data model.
 *
 * @example
 * ```typescript
 * import { bindSchema, createService, defineType, relation, scalar } from "nodeplane";
 * import { createLocalSqliteBackend } from "nodeplane/sqlite";
 *
 * const User = defineType("User", {
 *   fields: {
 *     email: scalar("String", { required: true, unique: true }),
 *     posts: relation("Post", { list: true, onDelete: "CASCADE" }),
 *   },
 * });
 *
 * const Post = defineType("Post", {
 *   fields: {
 *     title: scalar("String", { required: true }),
 *     author: relation("User", { required: true }),
 *   },
 * });
 *
 * const { backend } = createLocalSqliteBackend();
 * const service = createService({
 *   schema: bindSchema({ id: "blog@dev", types: [User, Post] }),
 *   backend,
 *   auth: { mode: "disabled" },
 * });
 *
 * await service.execute({
 *   operation: "createUser",
 *   args: { data: { email: "sarah@example.com", posts: { create: [{ title: "Hi" }] } } },
 *   select: { id: true, posts: { select: { title: true } } },
 * });
 * ```
 */

// ============================================================
// Data Model
// ============================================================

export { defineType, type DefineTypeOptions, SYSTEM_FIELDS } from "./core/define-type";
export {
  enumeration,
  relation,
  type RelationFieldOptions,
  scalar,
  type ScalarFieldOptions,
} from "./core/field";
export {
  type DeclarableScalarType,
  type DeletePolicy,
  type FieldDef,
  isRelationField,
  isScalarField,
  isTypeDef,
  type NodeRef,
  type NodeSnapshot,
  type RelationFieldDef,
  type ScalarFieldDef,
  type ScalarType,
  type TypeDef,
} from "./core/types";

// ============================================================
// Schema Binder
// ============================================================

export {
  bindSchema,
  type BindSchemaInput,
  defaultRelationName,
  getBoundType,
  getRelation,
  getRelationField,
} from "./schema/binder";
export { buildCatalog, describeOperations, pluralize } from "./schema/catalog";
export { type DatamodelDocument, datamodelSchema, loadDatamodel } from "./schema/loader";
export type {
  BoundField,
  BoundRelation,
  BoundRelationField,
  BoundScalarField,
  BoundSchema,
  BoundType,
  OperationAction,
  OperationCatalog,
  OperationDescriptor,
  OperationKind,
  RelationEnd,
  RelationSide,
} from "./schema/types";

// ============================================================
// Selector, Mutations and Connections
// ============================================================

export {
  findUnique,
  parseUniqueSelector,
  selectMany,
  selectUnique,
  type UniqueSelector,
} from "./selector/node-selector";
export { compileFilter, type Condition, evaluateFilter } from "./selector/where";

export { deleteWithCascade } from "./mutation/cascade";
export { type MutationContext } from "./mutation/context";
export {
  type BatchResult,
  createMutationExecutor,
  createOne,
  deleteManyNodes,
  deleteOne,
  type MutationExecutor,
  type MutationExecutorOptions,
  type MutationOptions,
  type TransactionOptions,
  updateManyNodes,
  updateOne,
  type UpsertArgs,
  upsertOne,
} from "./mutation/executor";

export { type ListArgs, listArgsSchema } from "./connection/args";
export {
  type Connection,
  type ConnectionScope,
  type Edge,
  type PageInfo,
  resolveConnection,
  resolveList,
} from "./connection/resolver";

// ============================================================
// Auth, Change Feed and Service
// ============================================================

export {
  type AuthConfig,
  type AuthGate,
  type AuthMode,
  createAuthGate,
  type Principal,
} from "./auth/gate";
export { createServiceToken, type ServiceTokenOptions } from "./auth/token";

export {
  type ChangeEvent,
  type ChangeFeed,
  type ChangeFeedOptions,
  type ChangeListener,
  createChangeFeed,
  type MutationType,
  type SubscribeOptions,
} from "./events/change-feed";

export { documentToRequest, type DocumentOperation } from "./service/graphql";
export { createService } from "./service/service";
export type {
  DataService,
  DocumentRequest,
  ExecuteContext,
  ExecutionResult,
  HookContext,
  OperationHookContext,
  OperationRequest,
  Selection,
  SelectionSet,
  ServiceHooks,
  ServiceOptions,
} from "./service/types";
export { operationRequestSchema, parseOperationRequest } from "./service/request";

// ============================================================
// Backend
// ============================================================

export type {
  LinkRow,
  NodeRow,
  StoreBackend,
  StoreOperations,
  TransactionBackend,
} from "./backend/types";
export { type StoreContext } from "./store/types";

// ============================================================
// Errors
// ============================================================

export {
  AuthError,
  type AuthErrorReason,
  ConfigurationError,
  DatabaseOperationError,
  type ErrorCategory,
  type ErrorPayload,
  getErrorSuggestion,
  isConstraintError,
  isNodeplaneError,
  isSystemError,
  isUserRecoverable,
  MissingNodeError,
  MutationAbortedError,
  MutationError,
  NodeplaneError,
  RequestError,
  type RequestErrorCode,
  RequiredRelationError,
  SchemaError,
  SelectorError,
  type SelectorErrorCode,
  toErrorPayload,
  UniquenessError,
  ValidationError,
  type ValidationIssue,
} from "./errors/index";

// ============================================================
// Utilities
// ============================================================

export { generateId, type IdGenerator, isGeneratedId } from "./utils/id";
export { err, ok, type Result, unwrap } from "./utils/result";
