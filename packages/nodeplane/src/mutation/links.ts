/**
 * Link writes made by nested `connect`, `disconnect` and `set`.
 */
import { type BoundRelationField } from "../schema/types";
import {
  fieldLinkParams,
  fieldLinks,
  oppositeFieldOf,
  partnerIdOf,
  toLinkParams,
} from "../store/links";
import { type MutationContext } from "./context";

/**
 * Removes every link of a single relation field except the one to `keepId`.
 */
async function releaseSingle(
  ctx: MutationContext,
  field: BoundRelationField,
  holderId: string,
  keepId: string,
): Promise<void> {
  for (const link of await fieldLinks(ctx, field, holderId)) {
    const partnerId = partnerIdOf(link, field.side);
    if (partnerId === keepId) continue;
    await ctx.backend.deleteLink(toLinkParams(link));
    ctx.unit.touch(field.target, partnerId);
  }
}

/**
 * Links a holder to a target through a relation field.
 *
 * A single field drops its previous link first, and so does the opposite
 * field when it is single. Linking an already linked pair changes nothing.
 */
export async function linkNodes(
  ctx: MutationContext,
  holderType: string,
  field: BoundRelationField,
  holderId: string,
  targetId: string,
): Promise<void> {
  if (!field.list) {
    await releaseSingle(ctx, field, holderId, targetId);
  }

  const opposite = oppositeFieldOf(ctx, field);
  if (opposite !== undefined && !opposite.list) {
    await releaseSingle(ctx, opposite, targetId, holderId);
  }

  await ctx.backend.insertLink(
    fieldLinkParams(ctx, holderType, field, holderId, targetId),
  );
  ctx.unit.touch(holderType, holderId);
  ctx.unit.touch(field.target, targetId);
}

export async function unlinkNodes(
  ctx: MutationContext,
  holderType: string,
  field: BoundRelationField,
  holderId: string,
  targetId: string,
): Promise<void> {
  await ctx.backend.deleteLink(
    fieldLinkParams(ctx, holderType, field, holderId, targetId),
  );
  ctx.unit.touch(holderType, holderId);
  ctx.unit.touch(field.target, targetId);
}
