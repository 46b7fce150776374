export { parseServeArgs } from "./cli.js";
export {
  resolveConfig,
  staticServerConfigSchema,
} from "./config.js";
export type { StaticServerConfig, StaticServerConfigInput } from "./config.js";
export {
  ResourceReadError,
  ResourceTransformError,
  StaticServerConfigError,
} from "./errors.js";
export {
  handlerFromFile,
  handlersFromDirs,
  listFiles,
  routeFor,
} from "./handlers.js";
export {
  contentTypeFor,
  DEFAULT_CONTENT_TYPE,
  HTML_CONTENT_TYPE,
  htlToHtml,
  resourceFromFile,
  transformers,
} from "./resource.js";
export { HtlStaticServer } from "./server.js";
export type { StaticServerOptions } from "./server.js";
export type {
  HandlerOptions,
  Logger,
  Resource,
  ResourceHandler,
  ResourceTransformer,
} from "./types.js";
