import { sign } from "hono/jwt";
import { z } from "zod";

export const SERVICE_TOKEN_ALGORITHM = "HS256" as const;

export type ServiceTokenOptions = Readonly<{
  secret: string;
  /** Service identifier carried in the token */
  service: string;
  /** Lifetime of the token (default: one hour) */
  expiresInSeconds?: number;
  /** Clock in milliseconds, for tests */
  now?: () => number;
}>;

/**
 * Claims a service token must carry. `exp` is required: a token without
 * one would never expire.
 */
export const serviceTokenClaimsSchema = z.object({
  exp: z.number().int(),
  data: z
    .object({
      service: z.string().optional(),
      roles: z.array(z.string()).optional(),
    })
    .optional(),
});

/**
 * Signs a service token accepted by an auth gate holding the same secret.
 *
 * @example
 * ```typescript
 * const token = await createServiceToken({
 *   secret: process.env.NODEPLANE_SECRET,
 *   service: "shop@prod",
 * });
 * fetch(url, { headers: { Authorization: `Bearer ${token}` } });
 * ```
 */
export async function createServiceToken(options: ServiceTokenOptions): Promise<string> {
  const issuedAt = Math.floor((options.now ?? Date.now)() / 1000);
  return sign(
    {
      data: { service: options.service, roles: ["admin"] },
      iat: issuedAt,
      exp: issuedAt + (options.expiresInSeconds ?? 3600),
    },
    options.secret,
    SERVICE_TOKEN_ALGORITHM,
  );
}
