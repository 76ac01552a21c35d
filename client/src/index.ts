// Client
export { RpcClient, type BoundOperation } from "./client.js";
export type { RpcClientOptions } from "./config.js";
export { ClientProcessor, projectResult, TRANSPORT_FAULT } from "./client-processor.js";
export type { ClientProcessorParams } from "./client-processor.js";

// Transports
export * from "./transport/index.js";
