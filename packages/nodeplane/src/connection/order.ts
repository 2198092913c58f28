import { type NodeSnapshot } from "../core/types";
import { RequestError } from "../errors/index";
import { type BoundType } from "../schema/types";

export type SortDirection = "ASC" | "DESC";

export type SortOrder = Readonly<{
  field: string;
  direction: SortDirection;
}>;

export const DEFAULT_ORDER: SortOrder = { field: "id", direction: "ASC" };

/**
 * Parses `field_ASC` / `field_DESC` against the scalar fields of a type.
 *
 * @throws RequestError (INVALID_ARGUMENTS)
 */
export function parseOrderBy(type: BoundType, orderBy: string | undefined): SortOrder {
  if (orderBy === undefined) return DEFAULT_ORDER;

  const match = /^([a-zA-Z][A-Za-z0-9]*)_(ASC|DESC)$/.exec(orderBy);
  const field = match?.[1];
  const direction = match?.[2];
  if (
    field === undefined ||
    (direction !== "ASC" && direction !== "DESC") ||
    type.fields.get(field)?.kind !== "scalar"
  ) {
    throw new RequestError(
      `Cannot order ${type.name} by "${orderBy}"`,
      "INVALID_ARGUMENTS",
      { type: type.name, orderBy },
      {
        suggestion: `Use <field>_ASC or <field>_DESC with a scalar field of ${type.name}.`,
      },
    );
  }
  return { field, direction };
}

function rank(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === "boolean") return 1;
  if (typeof value === "number") return 2;
  if (typeof value === "string") return 3;
  return 4;
}

/**
 * Total order over stored scalar values. Nulls sort first.
 */
export function compareValues(left: unknown, right: unknown): number {
  const byRank = rank(left) - rank(right);
  if (byRank !== 0) return byRank;

  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  const a = typeof left === "string" ? left : JSON.stringify(left);
  const b = typeof right === "string" ? right : JSON.stringify(right);
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Sorts nodes by one field, breaking ties on id ascending.
 */
export function sortNodes(
  nodes: readonly NodeSnapshot[],
  order: SortOrder,
): NodeSnapshot[] {
  const sign = order.direction === "ASC" ? 1 : -1;
  return [...nodes].sort((left, right) => {
    const primary = sign * compareValues(left[order.field], right[order.field]);
    if (primary !== 0) return primary;
    return compareValues(left.id, right.id);
  });
}
