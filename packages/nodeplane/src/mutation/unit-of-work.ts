import { type NodeRef } from "../core/types";
import { type ChangeEvent } from "../events/change-feed";

export function nodeKey(type: string, id: string): string {
  return `${type}/${id}`;
}

export type UnitOfWorkOptions = Readonly<{
  /** Batch mutations run without change events */
  recordEvents: boolean;
}>;

/**
 * What one mutation has done so far: the change events to publish after
 * commit, and the nodes whose required relations must be checked before it.
 */
export class UnitOfWork {
  readonly #recordEvents: boolean;
  readonly #events: ChangeEvent[] = [];
  readonly #touched = new Map<string, NodeRef>();
  readonly #deleted = new Set<string>();

  constructor(options: UnitOfWorkOptions) {
    this.#recordEvents = options.recordEvents;
  }

  get events(): readonly ChangeEvent[] {
    return this.#events;
  }

  record(event: ChangeEvent): void {
    if (this.#recordEvents) this.#events.push(event);
  }

  touch(type: string, id: string): void {
    this.#touched.set(nodeKey(type, id), { type, id });
  }

  markDeleted(type: string, id: string): void {
    this.#deleted.add(nodeKey(type, id));
  }

  isDeleted(type: string, id: string): boolean {
    return this.#deleted.has(nodeKey(type, id));
  }

  /**
   * Touched nodes that still exist, in the order they were first touched.
   */
  surviving(): NodeRef[] {
    return [...this.#touched.entries()]
      .filter(([key]) => !this.#deleted.has(key))
      .map(([, ref]) => ref);
  }
}
