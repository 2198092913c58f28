import { type Context, Hono } from "hono";
import { logger } from "hono/logger";
import { streamSSE } from "hono/streaming";
import {
  type ChangeEvent,
  type DataService,
  type DocumentRequest,
  type ErrorPayload,
  type ExecuteContext,
  type MutationType,
  type OperationRequest,
  parseOperationRequest,
  RequestError,
  toErrorPayload,
} from "nodeplane";
import { z } from "zod";

export type AppOptions = Readonly<{
  service: DataService;
  /** Request log sink; defaults to console.log */
  log?: (message: string, ...rest: string[]) => void;
  /** Events a subscriber may fall behind by before its stream is closed */
  maxPendingEvents?: number;
}>;

const DEFAULT_MAX_PENDING_EVENTS = 1000;

// ============================================================
// Request Parsing
// ============================================================

const documentBodySchema = z.object({
  query: z.string(),
  variables: z.record(z.string(), z.unknown()).nullish(),
  operationName: z.string().nullish(),
});

const mutationInSchema = z.array(z.enum(["CREATED", "UPDATED", "DELETED"])).min(1);

type ParsedBody =
  | Readonly<{ kind: "document"; request: DocumentRequest }>
  | Readonly<{ kind: "operation"; body: unknown }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function classifyBody(body: unknown): ParsedBody {
  if (isRecord(body) && "query" in body) {
    const result = documentBodySchema.safeParse(body);
    if (!result.success) {
      throw new RequestError(
        `Invalid GraphQL request: ${result.error.issues
          .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
        "INVALID_DOCUMENT",
        {},
        { cause: result.error },
      );
    }
    return { kind: "document", request: result.data };
  }
  return { kind: "operation", body };
}

function parseMutationIn(raw: string | undefined): readonly MutationType[] | undefined {
  if (raw === undefined) return undefined;
  const result = mutationInSchema.safeParse(raw.split(",").map((value) => value.trim()));
  if (!result.success) {
    throw new RequestError(
      `Invalid mutationIn "${raw}"`,
      "INVALID_ARGUMENTS",
      { mutationIn: raw },
      { suggestion: "Use a comma-separated list of CREATED, UPDATED and DELETED." },
    );
  }
  return result.data;
}

function executeContextOf(c: Context): ExecuteContext {
  const authorization = c.req.header("Authorization");
  return {
    ...(authorization !== undefined && { authorization }),
    signal: c.req.raw.signal,
  };
}

// ============================================================
// Status Mapping
// ============================================================

function statusFor(errors: readonly ErrorPayload[]): 200 | 401 | 500 {
  if (errors.some((error) => error.code === "AUTH_ERROR")) return 401;
  if (errors.some((error) => error.category === "system")) return 500;
  return 200;
}

function badRequest(c: Context, error: unknown) {
  return c.json({ errors: [toErrorPayload(error)] }, 400);
}

// ============================================================
// App
// ============================================================

/**
 * Builds the HTTP surface of a service:
 *
 * - `POST /` runs a GraphQL document or an `{ operation, args, select }` body
 * - `GET /health` reports liveness and the auth mode
 * - `GET /subscriptions/:type` streams change events as server-sent events
 */
export function createApp({
  service,
  log,
  maxPendingEvents = DEFAULT_MAX_PENDING_EVENTS,
}: AppOptions): Hono {
  const app = new Hono();

  app.use(log === undefined ? logger() : logger(log));

  app.get("/health", (c) => c.json({ status: "ok", auth: service.authMode }));

  app.post("/", async (c) => {
    let parsed: ParsedBody;
    try {
      const body: unknown = await c.req.json();
      parsed = classifyBody(body);
    } catch (error) {
      return badRequest(
        c,
        error instanceof RequestError ? error : (
          new RequestError("Request body is not valid JSON", "INVALID_DOCUMENT", {}, {
            cause: error,
          })
        ),
      );
    }

    const context = executeContextOf(c);

    if (parsed.kind === "document") {
      const result = await service.executeDocument(parsed.request, context);
      return "errors" in result ?
          c.json(result, statusFor(result.errors))
        : c.json(result, 200);
    }

    let request: OperationRequest;
    try {
      request = parseOperationRequest(parsed.body);
    } catch (error) {
      return badRequest(c, error);
    }

    try {
      const value = await service.execute(request, context);
      return c.json({ data: { [request.operation]: value } }, 200);
    } catch (error) {
      const errors = [toErrorPayload(error)];
      return c.json({ errors }, statusFor(errors));
    }
  });

  app.get("/subscriptions/:type", async (c) => {
    const pending: ChangeEvent[] = [];
    let wake: (() => void) | undefined;
    let unsubscribe: () => void;
    let overflowed = false;

    try {
      const mutationIn = parseMutationIn(c.req.query("mutationIn"));
      unsubscribe = await service.subscribe(
        c.req.param("type"),
        (event) => {
          if (overflowed) return;
          if (pending.length >= maxPendingEvents) {
            overflowed = true;
            pending.length = 0;
            unsubscribe();
          } else {
            pending.push(event);
          }
          wake?.();
        },
        {
          ...executeContextOf(c),
          ...(mutationIn !== undefined && { mutationIn }),
        },
      );
    } catch (error) {
      const errors = [toErrorPayload(error)];
      const status = statusFor(errors);
      return c.json({ errors }, status === 200 ? 400 : status);
    }

    return streamSSE(c, async (stream) => {
      stream.onAbort(() => {
        unsubscribe();
        wake?.();
      });

      let sequence = 0;
      while (!stream.aborted) {
        if (overflowed) {
          const overflow = new RequestError(
            `Subscriber fell more than ${maxPendingEvents} events behind`,
            "SUBSCRIPTION_OVERFLOW",
            { limit: maxPendingEvents },
            { suggestion: "Reconnect and read events as they arrive." },
          );
          await stream.writeSSE({
            event: "error",
            data: JSON.stringify({ errors: [toErrorPayload(overflow)] }),
          });
          break;
        }
        const event = pending.shift();
        if (event === undefined) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          wake = undefined;
          continue;
        }
        sequence += 1;
        await stream.writeSSE({
          id: String(sequence),
          event: event.mutation,
          data: JSON.stringify(event),
        });
      }
    });
  });

  return app;
}
