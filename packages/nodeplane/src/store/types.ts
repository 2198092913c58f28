import { type StoreOperations } from "../backend/types";
import { type BoundSchema } from "../schema/types";

/**
 * What reads and writes against the node store need: the bound schema and
 * a backend handle, either the backend itself or an open transaction.
 */
export type StoreContext = Readonly<{
  schema: BoundSchema;
  backend: StoreOperations;
}>;
