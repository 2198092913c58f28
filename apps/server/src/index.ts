import { serve } from "@hono/node-server";
import { isNodeplaneError } from "nodeplane";

import { createApp } from "./app";
import { createServerService } from "./bootstrap";
import { loadConfig } from "./config";
import { createLoggingHooks } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  const service = await createServerService(config, createLoggingHooks(console));

  if (service.authMode === "disabled") {
    console.warn("Authentication is disabled: every request is admitted.");
  }

  const app = createApp({ service });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`Service ${config.serviceId} listening on http://localhost:${info.port}`);
  });

  const shutdown = () => {
    server.close();
    service.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(isNodeplaneError(error) ? error.toLogString() : error);
  process.exit(1);
});
