export { createHttpTransport, type HttpTransportConfig } from "./http-transport.js";
export { createNatsTransport, type NatsRequester, type NatsTransportConfig } from "./nats-transport.js";
export { createLoopbackTransport } from "./loopback-transport.js";
