/**
 * GraphQL document adapter.
 *
 * Turns a document with exactly one query or mutation operation and one
 * root field into an operation request. The document is parsed, not
 * validated against a schema: arguments are resolved against the
 * variables, fragments are flattened and nested aliases are ignored.
 *
 * @example
 * ```typescript
 * const { responseKey, request } = documentToRequest({
 *   query: `mutation ($emails: [String!]) {
 *     deleteManyUsers(where: { email_in: $emails }) { count }
 *   }`,
 *   variables: { emails: ["a@example.com"] },
 * });
 * ```
 */
import {
  type DocumentNode,
  type FieldNode,
  type FragmentDefinitionNode,
  GraphQLError,
  Kind,
  type OperationDefinitionNode,
  OperationTypeNode,
  parse,
  type SelectionSetNode,
  valueFromASTUntyped,
} from "graphql";

import { RequestError } from "../errors/index";
import { type OperationKind } from "../schema/types";
import {
  type DocumentRequest,
  type OperationRequest,
  type Selection,
  type SelectionSet,
} from "./types";

export type DocumentOperation = Readonly<{
  kind: OperationKind;
  /** Key of the root field in the response (its alias, if any) */
  responseKey: string;
  request: OperationRequest;
}>;

type Variables = Readonly<Record<string, unknown>>;

type Fragments = ReadonlyMap<string, FragmentDefinitionNode>;

/** A field together with the fragments it was spread through */
type CollectedField = Readonly<{
  node: FieldNode;
  via: ReadonlySet<string>;
}>;

function documentError(message: string, cause?: unknown): RequestError {
  return new RequestError(message, "INVALID_DOCUMENT", {}, { cause });
}

function parseDocument(query: string): DocumentNode {
  try {
    return parse(query);
  } catch (error) {
    if (error instanceof GraphQLError) {
      throw documentError(`Invalid GraphQL document: ${error.message}`, error);
    }
    throw error;
  }
}

function pickOperation(
  document: DocumentNode,
  operationName: string | undefined,
): OperationDefinitionNode {
  const operations = document.definitions.filter(
    (definition): definition is OperationDefinitionNode =>
      definition.kind === Kind.OPERATION_DEFINITION,
  );

  const candidates =
    operationName === undefined ? operations : (
      operations.filter((operation) => operation.name?.value === operationName)
    );

  const [operation] = candidates;
  if (operation === undefined || candidates.length !== 1) {
    throw documentError(
      operationName === undefined ?
        `Expected exactly one operation, found ${candidates.length}`
      : `Expected one operation named "${operationName}", found ${candidates.length}`,
    );
  }
  return operation;
}

function toKind(operation: OperationDefinitionNode): OperationKind {
  switch (operation.operation) {
    case OperationTypeNode.QUERY: {
      return "query";
    }
    case OperationTypeNode.MUTATION: {
      return "mutation";
    }
    case OperationTypeNode.SUBSCRIPTION: {
      throw documentError(
        "Subscriptions are served by the change feed, not by documents",
      );
    }
  }
}

/**
 * Collects the fields of a selection set, expanding fragment spreads and
 * inline fragments in place.
 */
function collectFields(
  selectionSet: SelectionSetNode,
  fragments: Fragments,
  visiting: ReadonlySet<string>,
): CollectedField[] {
  const fields: CollectedField[] = [];
  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        fields.push({ node: selection, via: visiting });
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        fields.push(...collectFields(selection.selectionSet, fragments, visiting));
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const name = selection.name.value;
        const fragment = fragments.get(name);
        if (fragment === undefined) {
          throw documentError(`Unknown fragment "${name}"`);
        }
        if (visiting.has(name)) {
          throw documentError(`Fragment "${name}" spreads itself`);
        }
        fields.push(
          ...collectFields(fragment.selectionSet, fragments, new Set([...visiting, name])),
        );
        break;
      }
    }
  }
  return fields;
}

function fieldArgs(
  field: FieldNode,
  variables: Variables,
): Record<string, unknown> | undefined {
  if (field.arguments === undefined || field.arguments.length === 0) {
    return undefined;
  }
  const args: Record<string, unknown> = {};
  for (const argument of field.arguments) {
    args[argument.name.value] = valueFromASTUntyped(argument.value, variables);
  }
  return args;
}

function mergeSelection(left: Selection | undefined, right: Selection): Selection {
  if (left === undefined || left === true) return right;
  if (right === true) return left;

  const select =
    left.select === undefined ? right.select
    : right.select === undefined ? left.select
    : mergeSelectionSets(left.select, right.select);
  const args = right.args ?? left.args;

  return {
    ...(args !== undefined && { args }),
    ...(select !== undefined && { select }),
  };
}

function mergeSelectionSets(left: SelectionSet, right: SelectionSet): SelectionSet {
  const merged: Record<string, Selection> = { ...left };
  for (const [key, selection] of Object.entries(right)) {
    merged[key] = mergeSelection(merged[key], selection);
  }
  return merged;
}

function toSelectionSet(
  selectionSet: SelectionSetNode,
  fragments: Fragments,
  variables: Variables,
  visiting: ReadonlySet<string>,
): SelectionSet {
  const result: Record<string, Selection> = {};
  for (const field of collectFields(selectionSet, fragments, visiting)) {
    const key = field.node.name.value;
    result[key] = mergeSelection(result[key], toSelection(field, fragments, variables));
  }
  return result;
}

function toSelection(
  field: CollectedField,
  fragments: Fragments,
  variables: Variables,
): Selection {
  const args = fieldArgs(field.node, variables);
  const select =
    field.node.selectionSet === undefined ? undefined : (
      toSelectionSet(field.node.selectionSet, fragments, variables, field.via)
    );
  if (args === undefined && select === undefined) return true;
  return {
    ...(args !== undefined && { args }),
    ...(select !== undefined && { select }),
  };
}

/**
 * Converts a GraphQL document into an operation request.
 *
 * @throws RequestError (INVALID_DOCUMENT)
 */
export function documentToRequest(request: DocumentRequest): DocumentOperation {
  const document = parseDocument(request.query);
  const operation = pickOperation(document, request.operationName ?? undefined);
  const kind = toKind(operation);
  const variables: Variables = request.variables ?? {};

  const fragments = new Map<string, FragmentDefinitionNode>();
  for (const definition of document.definitions) {
    if (definition.kind === Kind.FRAGMENT_DEFINITION) {
      fragments.set(definition.name.value, definition);
    }
  }

  const rootFields = collectFields(operation.selectionSet, fragments, new Set());
  const [root] = rootFields;
  if (root === undefined || rootFields.length !== 1) {
    throw documentError(
      `Expected exactly one root field, found ${rootFields.length}`,
    );
  }

  const selection = toSelection(root, fragments, variables);
  const { node } = root;

  return {
    kind,
    responseKey: node.alias?.value ?? node.name.value,
    request: {
      operation: node.name.value,
      ...(selection !== true && selection),
    },
  };
}
