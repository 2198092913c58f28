/**
 * Cascade Resolver
 *
 * Deletes a node and applies the delete policy of every relation end it
 * sits on. `CASCADE` deletes the partner in turn, `SET_NULL` only drops
 * the link. A visited set keyed by node identity ends cycles, so every
 * reachable dependent is deleted exactly once.
 */
import { type NodeRef, type NodeSnapshot } from "../core/types";
import { SchemaError } from "../errors/index";
import { getBoundType } from "../schema/binder";
import { type BoundRelation } from "../schema/types";
import { oppositeSide, partnerIdOf, toLinkParams } from "../store/links";
import { readNode, removeNode } from "../store/nodes";
import { type MutationContext, throwIfAborted } from "./context";
import { nodeKey } from "./unit-of-work";

function relationNamed(ctx: MutationContext, name: string): BoundRelation {
  const relation = ctx.schema.relations.get(name);
  if (relation === undefined) {
    throw new SchemaError(`Relation "${name}" is not part of the schema`, {
      relation: name,
    });
  }
  return relation;
}

/**
 * Deletes a node and everything its `CASCADE` ends reach.
 *
 * @returns The deleted nodes in deletion order; empty if the node is
 * already gone
 */
export async function deleteWithCascade(
  ctx: MutationContext,
  typeName: string,
  id: string,
): Promise<NodeSnapshot[]> {
  const deleted: NodeSnapshot[] = [];
  const visited = new Set<string>([nodeKey(typeName, id)]);
  const queue: NodeRef[] = [{ type: typeName, id }];

  for (let ref = queue.shift(); ref !== undefined; ref = queue.shift()) {
    throwIfAborted(ctx);

    const type = getBoundType(ctx.schema, ref.type);
    const snapshot = await readNode(ctx, ref.type, ref.id);
    if (snapshot === undefined) continue;

    // Self-relations are visited once per side
    for (const participation of type.participations) {
      const relation = relationNamed(ctx, participation.relation);
      const policy = relation[participation.side].onDelete;
      const partnerType = relation[oppositeSide(participation.side)].type;

      const links = await ctx.backend.findLinks({
        serviceId: ctx.schema.id,
        relation: relation.name,
        side: participation.side,
        nodeId: ref.id,
      });

      for (const link of links) {
        const partnerId = partnerIdOf(link, participation.side);
        await ctx.backend.deleteLink(toLinkParams(link));

        if (policy === "CASCADE") {
          const key = nodeKey(partnerType, partnerId);
          if (!visited.has(key)) {
            visited.add(key);
            queue.push({ type: partnerType, id: partnerId });
          }
        } else {
          ctx.unit.touch(partnerType, partnerId);
        }
      }
    }

    await removeNode(ctx, type, snapshot);
    ctx.unit.markDeleted(ref.type, ref.id);
    ctx.unit.record({
      mutation: "DELETED",
      type: ref.type,
      node: null,
      previousValues: snapshot,
      updatedFields: null,
    });
    deleted.push(snapshot);
  }

  return deleted;
}
