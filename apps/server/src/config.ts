import { type AuthConfig, ConfigurationError } from "nodeplane";
import { z } from "zod";

// ============================================================
// Environment
// ============================================================

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(4466),
  NODEPLANE_DATABASE: z.string().min(1).default(":memory:"),
  NODEPLANE_DATAMODEL: z.string().min(1).default("./datamodel.json"),
  NODEPLANE_SERVICE: z
    .string()
    .regex(/^[^@\s]+@[^@\s]+$/, "Expected <name>@<stage>")
    .default("default@default"),
  /** Comma-separated; any listed secret is accepted */
  NODEPLANE_SECRET: z.string().optional(),
  NODEPLANE_DISABLE_AUTH: z.enum(["true", "false"]).optional(),
});

export type ServerConfig = Readonly<{
  port: number;
  databasePath: string;
  datamodelPath: string;
  serviceId: string;
  auth: AuthConfig;
}>;

function toAuthConfig(
  secret: string | undefined,
  disableAuth: boolean,
): AuthConfig {
  const secrets = (secret ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (secrets.length > 0 && disableAuth) {
    throw new ConfigurationError(
      "NODEPLANE_SECRET and NODEPLANE_DISABLE_AUTH are mutually exclusive",
      {},
      { suggestion: "Unset one of NODEPLANE_SECRET or NODEPLANE_DISABLE_AUTH." },
    );
  }
  if (disableAuth) return { mode: "disabled" };
  if (secrets.length === 0) {
    throw new ConfigurationError(
      "No authentication configured",
      {},
      {
        suggestion:
          "Set NODEPLANE_SECRET, or NODEPLANE_DISABLE_AUTH=true to run without authentication.",
      },
    );
  }
  return { mode: "secret", secrets };
}

/**
 * Reads the server configuration from environment variables.
 *
 * @throws ConfigurationError when a variable is malformed or auth is ambiguous
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid environment: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join("; ")}`,
      { issues },
      { cause: result.error },
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    databasePath: parsed.NODEPLANE_DATABASE,
    datamodelPath: parsed.NODEPLANE_DATAMODEL,
    serviceId: parsed.NODEPLANE_SERVICE,
    auth: toAuthConfig(
      parsed.NODEPLANE_SECRET,
      parsed.NODEPLANE_DISABLE_AUTH === "true",
    ),
  };
}
