export { RpcService, type RpcServiceOptions } from "./service.js";
export {
  ServiceProcessor,
  type OperationHandler,
  type ServiceProcessorParams,
} from "./service-processor.js";
export {
  DEFAULT_MAX_BODY_BYTES,
  createHttpListener,
  handleHttpRequest,
  readBody,
  serveHttp,
  type HttpBindingOptions,
  type HttpRequestLike,
  type HttpResponseLike,
  type ServeHttpOptions,
} from "./http/server.js";
export {
  NatsServiceWorker,
  type NatsMessage,
  type NatsServiceWorkerParams,
  type NatsSubscriber,
  type NatsSubscription,
} from "./nats/worker.js";
export { loadConfig, loadDescriptionFile, type ServiceProcessConfig } from "./config.js";
export { createNodeJSLogger } from "./logger.js";
