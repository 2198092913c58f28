import { readFile } from "node:fs/promises";

import {
  bindSchema,
  ConfigurationError,
  createService,
  type DataService,
  loadDatamodel,
  SchemaError,
  type ServiceHooks,
} from "nodeplane";
import { createLocalSqliteBackend } from "nodeplane/sqlite";

import type { ServerConfig } from "./config";

async function readDatamodel(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read data model "${path}"`,
      { path },
      { cause: error, suggestion: "Point NODEPLANE_DATAMODEL at a JSON data model." },
    );
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new SchemaError(`Data model "${path}" is not valid JSON`, { path }, {
      cause: error,
    });
  }
}

/**
 * Loads and binds the data model, opens the database and wires the service.
 *
 * @throws ConfigurationError when the data model file cannot be read
 * @throws SchemaError when the data model is invalid
 */
export async function createServerService(
  config: ServerConfig,
  hooks?: ServiceHooks,
): Promise<DataService> {
  const document = await readDatamodel(config.datamodelPath);
  const schema = bindSchema({
    id: config.serviceId,
    types: loadDatamodel(document),
  });
  const { backend } = createLocalSqliteBackend({ path: config.databasePath });

  return createService({
    schema,
    backend,
    auth: config.auth,
    ...(hooks !== undefined && { hooks }),
  });
}
