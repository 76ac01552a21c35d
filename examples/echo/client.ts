/**
 * Calls the echo service. Start examples/echo/service.ts first.
 */

import "dotenv/config";
import { readFileSync } from "node:fs";
import { RpcClient } from "@switchrpc/client";
import { fromDescription } from "@switchrpc/core";

async function main(): Promise<void> {
  const api = fromDescription(JSON.parse(readFileSync(new URL("./api.json", import.meta.url), "utf-8")));
  const client = new RpcClient({ api, loggerFactory: {} });
  const Unauthorized = client.exceptions.fault("Unauthorized");

  console.log(await client.call("upper", "hello"));
  console.log(await client.call("split", "key=value", "="));

  const whoami = client.operation("whoami");
  console.log(await whoami("test-secret"));
  try {
    await whoami("wrong");
  } catch (err) {
    if (!(err instanceof Unauthorized)) throw err;
    console.log(`rejected: ${err.args.join(", ")}`);
  }
}

main().catch((err) => {
  console.error("echo-client - Fatal:", err);
  process.exit(1);
});
