/**
 * Echo service: serves examples/echo/api.json over HTTP, and over NATS when
 * NATS_URL is set.
 */

import "dotenv/config";
import { fileURLToPath } from "node:url";
import {
  NatsServiceWorker,
  RpcService,
  createNodeJSLogger,
  loadConfig,
  loadDescriptionFile,
  serveHttp,
} from "@switchrpc/service";

const SERVICE_NAME = "echo-service";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadConfig({ log });
  const api = loadDescriptionFile(
    config.descriptionPath ?? fileURLToPath(new URL("./api.json", import.meta.url)),
    { debug: config.debug }
  );

  const service = new RpcService({ api, loggerFactory });
  const Unauthorized = service.exceptions.fault("Unauthorized");

  service
    .use("request", async (context) => {
      const started = Date.now();
      await context.continue();
      log.info?.({ operation: context.operation, ms: Date.now() - started }, `${SERVICE_NAME}:main - Call`);
    })
    .operation("upper", (request, response) => {
      response.set("result", String(request.get("text")).toUpperCase());
    })
    .operation("split", (request, response) => {
      const text = String(request.get("text"));
      const sep = String(request.get("sep") ?? " ");
      const at = text.indexOf(sep);
      response.set("head", at === -1 ? text : text.slice(0, at));
      response.set("tail", at === -1 ? "" : text.slice(at + sep.length));
    })
    .operation("whoami", (request, response) => {
      if (request.get("token") !== "test-secret") throw new Unauthorized("bad token");
      response.set("user", "demo");
    });

  const server = await serveHttp(service, {
    host: config.host,
    port: config.port,
    maxBodyBytes: config.maxBodyBytes,
    loggerFactory,
  });

  const worker = config.natsUrl
    ? new NatsServiceWorker({
        service,
        natsUrl: config.natsUrl,
        queue: config.natsQueue,
        log: loggerFactory.get(`${SERVICE_NAME}:nats`),
      })
    : null;
  await worker?.start();

  const shutdown = async (signal: string): Promise<void> => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await worker?.stop();
    server.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
