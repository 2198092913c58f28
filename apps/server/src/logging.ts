import { isNodeplaneError, isUserRecoverable, type ServiceHooks } from "nodeplane";

export type LogSink = Pick<Console, "info" | "warn" | "error">;

/**
 * Service hooks that write one line per finished operation and per failure.
 * Failures a client can fix go to `warn`; everything else to `error`.
 */
export function createLoggingHooks(log: LogSink): ServiceHooks {
  return {
    onOperationEnd: (ctx, { durationMs }) => {
      log.info(`[${ctx.operationId}] ${ctx.operation} ${durationMs.toFixed(1)}ms`);
    },
    onError: (ctx, error) => {
      if (isUserRecoverable(error)) {
        log.warn(`[${ctx.operationId}] ${error.name}: ${error.message}`);
        return;
      }
      log.error(
        `[${ctx.operationId}] ${
          isNodeplaneError(error) ? error.toLogString() : (error.stack ?? error.message)
        }`,
      );
    },
  };
}
