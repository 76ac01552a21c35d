// Errors
export * from "./errors.js";

// Names & description
export * from "./names.js";
export * from "./description.js";

// Call payloads
export { Container } from "./container.js";
export { CallContext, type CallState } from "./context.js";

// Faults & wire protocol
export * from "./exceptions.js";
export * from "./wire.js";

// Pipeline
export * from "./plugins.js";
export * from "./processor.js";

// Collaborators
export { type Codec, jsonCodec } from "./codec.js";
export * from "./transport.js";
export * from "./logger.js";
