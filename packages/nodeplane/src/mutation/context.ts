import { MutationAbortedError } from "../errors/index";
import { type StoreContext } from "../store/types";
import { type IdGenerator } from "../utils/id";
import { type UnitOfWork } from "./unit-of-work";

/**
 * Everything a sub-action of a running mutation needs. `backend` is the
 * open transaction.
 */
export type MutationContext = StoreContext &
  Readonly<{
    unit: UnitOfWork;
    /** Operation name, used in error messages */
    operation: string;
    signal: AbortSignal | undefined;
    /** Write timestamp shared by every node the mutation touches */
    timestamp: string;
    generateId: IdGenerator;
  }>;

/**
 * @throws MutationAbortedError once the caller's signal has fired
 */
export function throwIfAborted(ctx: MutationContext): void {
  if (ctx.signal?.aborted === true) {
    throw new MutationAbortedError(ctx.operation, { cause: ctx.signal.reason });
  }
}
