/**
 * Relation links seen from a relation field: the node holding the field
 * sits on the field's side, its partners on the other.
 */
import { type LinkParams, type LinkRow } from "../backend/types";
import { type NodeSnapshot } from "../core/types";
import { getBoundType, getRelationField } from "../schema/binder";
import { type BoundRelationField, type RelationSide } from "../schema/types";
import { readNode } from "./nodes";
import { type StoreContext } from "./types";

export function oppositeSide(side: RelationSide): RelationSide {
  return side === "A" ? "B" : "A";
}

/**
 * Id of the node on the other side of a link.
 */
export function partnerIdOf(link: LinkRow, side: RelationSide): string {
  return side === "A" ? link.b_id : link.a_id;
}

/**
 * The field on the target type that holds the other end of a relation
 * field, if the relation is two-sided.
 */
export function oppositeFieldOf(
  ctx: StoreContext,
  field: BoundRelationField,
): BoundRelationField | undefined {
  if (field.opposite === undefined) return undefined;
  return getRelationField(
    getBoundType(ctx.schema, field.opposite.type),
    field.opposite.field,
  );
}

export function toLinkParams(link: LinkRow): LinkParams {
  return {
    serviceId: link.service_id,
    relation: link.relation,
    aKind: link.a_kind,
    aId: link.a_id,
    bKind: link.b_kind,
    bId: link.b_id,
  };
}

/**
 * Link parameters for a link between the holder of a field and a target.
 */
export function fieldLinkParams(
  ctx: StoreContext,
  holderType: string,
  field: BoundRelationField,
  holderId: string,
  targetId: string,
): LinkParams {
  const holder = { kind: holderType, id: holderId };
  const target = { kind: field.target, id: targetId };
  const [a, b] = field.side === "A" ? [holder, target] : [target, holder];
  return {
    serviceId: ctx.schema.id,
    relation: field.relation,
    aKind: a.kind,
    aId: a.id,
    bKind: b.kind,
    bId: b.id,
  };
}

/**
 * Links of a relation field held by a node.
 */
export async function fieldLinks(
  ctx: StoreContext,
  field: BoundRelationField,
  holderId: string,
): Promise<readonly LinkRow[]> {
  return ctx.backend.findLinks({
    serviceId: ctx.schema.id,
    relation: field.relation,
    side: field.side,
    nodeId: holderId,
  });
}

/**
 * Ids of the nodes a relation field of a node points at.
 */
export async function linkedIds(
  ctx: StoreContext,
  field: BoundRelationField,
  holderId: string,
): Promise<string[]> {
  const links = await fieldLinks(ctx, field, holderId);
  return links.map((link) => partnerIdOf(link, field.side));
}

/**
 * Snapshots of the nodes a relation field of a node points at.
 */
export async function linkedNodes(
  ctx: StoreContext,
  field: BoundRelationField,
  holderId: string,
): Promise<NodeSnapshot[]> {
  const nodes: NodeSnapshot[] = [];
  for (const id of await linkedIds(ctx, field, holderId)) {
    const node = await readNode(ctx, field.target, id);
    if (node !== undefined) nodes.push(node);
  }
  return nodes;
}
