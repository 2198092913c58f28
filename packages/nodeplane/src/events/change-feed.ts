/**
 * Change Feed
 *
 * Delivers change events to subscribers after the mutation that produced
 * them has committed.
 *
 * @example
 * ```typescript
 * const unsubscribe = feed.subscribe("User", (event) => {
 *   console.log(event.mutation, event.node?.id);
 * }, { mutationIn: ["CREATED"] });
 * ```
 */
import { type NodeSnapshot } from "../core/types";

// ============================================================
// Types
// ============================================================

export type MutationType = "CREATED" | "UPDATED" | "DELETED";

export type ChangeEvent = Readonly<{
  mutation: MutationType;
  type: string;
  /** State after the change; null for deletions */
  node: NodeSnapshot | null;
  /** State before the change; null for creations */
  previousValues: NodeSnapshot | null;
  /** Scalar fields written by an update; null otherwise */
  updatedFields: readonly string[] | null;
}>;

export type ChangeListener = (event: ChangeEvent) => void | Promise<void>;

export type SubscribeOptions = Readonly<{
  /** Only deliver these mutation types (default: all) */
  mutationIn?: readonly MutationType[];
}>;

export type ChangeFeedOptions = Readonly<{
  /** Receives listener failures (default: console.error) */
  onListenerError?: (error: unknown, event: ChangeEvent) => void;
}>;

export type ChangeFeed = Readonly<{
  publish: (events: readonly ChangeEvent[]) => void;
  subscribe: (
    type: string,
    listener: ChangeListener,
    options?: SubscribeOptions,
  ) => () => void;
  listenerCount: (type?: string) => number;
}>;

type Subscription = Readonly<{
  listener: ChangeListener;
  mutationIn: ReadonlySet<MutationType> | undefined;
}>;

// ============================================================
// Factory
// ============================================================

function defaultListenerError(error: unknown, event: ChangeEvent): void {
  console.error(
    `Change listener for ${event.type} ${event.mutation} failed:`,
    error,
  );
}

export function createChangeFeed(options: ChangeFeedOptions = {}): ChangeFeed {
  const subscriptions = new Map<string, Set<Subscription>>();
  const onListenerError = options.onListenerError ?? defaultListenerError;

  function deliver(subscription: Subscription, event: ChangeEvent): void {
    try {
      const result = subscription.listener(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          onListenerError(error, event);
        });
      }
    } catch (error) {
      onListenerError(error, event);
    }
  }

  return {
    publish(events) {
      for (const event of events) {
        const subscribers = subscriptions.get(event.type);
        if (subscribers === undefined) continue;
        for (const subscription of [...subscribers]) {
          if (
            subscription.mutationIn === undefined ||
            subscription.mutationIn.has(event.mutation)
          ) {
            deliver(subscription, event);
          }
        }
      }
    },

    subscribe(type, listener, subscribeOptions = {}) {
      const subscription: Subscription = {
        listener,
        mutationIn:
          subscribeOptions.mutationIn === undefined ?
            undefined
          : new Set(subscribeOptions.mutationIn),
      };
      const subscribers = subscriptions.get(type) ?? new Set<Subscription>();
      subscribers.add(subscription);
      subscriptions.set(type, subscribers);

      return () => {
        subscribers.delete(subscription);
        if (subscribers.size === 0 && subscriptions.get(type) === subscribers) {
          subscriptions.delete(type);
        }
      };
    },

    listenerCount(type) {
      if (type !== undefined) return subscriptions.get(type)?.size ?? 0;
      let total = 0;
      for (const subscribers of subscriptions.values()) total += subscribers.size;
      return total;
    },
  };
}
