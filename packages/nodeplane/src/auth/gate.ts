/**
 * Auth Gate
 *
 * Admits a request when it presents a `Bearer` token signed with one of
 * the configured service secrets and not yet expired. Running without a
 * secret is an explicit mode of its own.
 *
 * @example
 * ```typescript
 * const gate = createAuthGate({ mode: "secret", secrets: ["s3cret"] });
 * const result = await gate.authenticate(request.headers.authorization);
 * if (!result.success) return reject(result.error.reason);
 * ```
 */
import { verify } from "hono/jwt";

import { AuthError, ConfigurationError } from "../errors/index";
import { err, firstOk, ok, type Result } from "../utils/result";
import { SERVICE_TOKEN_ALGORITHM, serviceTokenClaimsSchema } from "./token";

// ============================================================
// Types
// ============================================================

export type AuthConfig =
  | Readonly<{
      mode: "secret";
      /** Accepted signing secrets; several allow rotation */
      secrets: readonly string[];
    }>
  | Readonly<{ mode: "disabled" }>;

export type AuthMode = AuthConfig["mode"];

export type Principal = Readonly<{
  /** False only when the gate is disabled */
  authenticated: boolean;
  service: string | undefined;
  roles: readonly string[];
}>;

export type AuthGate = Readonly<{
  mode: AuthMode;
  authenticate: (
    authorization: string | undefined,
  ) => Promise<Result<Principal, AuthError>>;
}>;

const ANONYMOUS: Principal = {
  authenticated: false,
  service: undefined,
  roles: [],
};

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

// ============================================================
// Token Handling
// ============================================================

function readBearer(authorization: string | undefined): Result<string, AuthError> {
  if (authorization === undefined || authorization.trim() === "") {
    return err(new AuthError("No service token presented", "MISSING_TOKEN"));
  }
  const token = BEARER_PATTERN.exec(authorization.trim())?.[1];
  if (token === undefined) {
    return err(
      new AuthError(
        'Authorization header must have the form "Bearer <token>"',
        "MALFORMED_HEADER",
      ),
    );
  }
  return ok(token);
}

function classify(error: unknown): AuthError {
  if (error instanceof Error && error.name === "JwtTokenExpired") {
    return new AuthError("Service token has expired", "EXPIRED_TOKEN", {
      cause: error,
    });
  }
  return new AuthError("Service token is not valid", "INVALID_TOKEN", {
    cause: error,
  });
}

async function verifyWith(
  token: string,
  secret: string,
): Promise<Result<Principal, AuthError>> {
  try {
    const payload = await verify(token, secret, SERVICE_TOKEN_ALGORITHM);
    const claims = serviceTokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      return err(
        new AuthError("Service token claims are malformed", "INVALID_TOKEN", {
          cause: claims.error,
        }),
      );
    }
    return ok({
      authenticated: true,
      service: claims.data.data?.service,
      roles: claims.data.data?.roles ?? [],
    });
  } catch (error) {
    return err(classify(error));
  }
}

// ============================================================
// Factory
// ============================================================

/**
 * Creates an auth gate.
 *
 * @throws ConfigurationError when no configuration is given, or a secret
 * gate has no usable secret
 */
export function createAuthGate(config: AuthConfig | undefined): AuthGate {
  if (config === undefined) {
    throw new ConfigurationError("Auth configuration is required", {}, {
      suggestion: `Pass { mode: "secret", secrets } or, to run unauthenticated, { mode: "disabled" }.`,
    });
  }

  if (config.mode === "disabled") {
    return {
      mode: "disabled",
      authenticate: async () => ok(ANONYMOUS),
    };
  }

  const secrets = config.secrets.filter((secret) => secret.length > 0);
  if (secrets.length === 0) {
    throw new ConfigurationError("Secret auth mode needs at least one secret", {
      mode: config.mode,
    });
  }

  return {
    mode: "secret",
    async authenticate(authorization) {
      const bearer = readBearer(authorization);
      if (!bearer.success) return bearer;

      return firstOk(
        secrets,
        (secret) => verifyWith(bearer.data, secret),
        new AuthError("Service token is not valid", "INVALID_TOKEN"),
      );
    },
  };
}
