import type { RouteHandlerMethod } from "fastify";

/**
 * Bytes served for one file, with their content type
 */
export type Resource = {
  contentType: string;
  content: Buffer;
};

/**
 * Rewrites a loaded resource, e.g. HTL source into HTML
 */
export type ResourceTransformer = (
  resource: Resource,
  filename: string
) => Resource;

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export type ResourceHandler = RouteHandlerMethod;

export type HandlerOptions = {
  /** Reload the file on every request instead of serving cached bytes */
  dev?: boolean;
  logger?: Logger;
  /** Extension (with dot) → transformer; defaults to {@link transformers} */
  transformers?: ReadonlyMap<string, ResourceTransformer>;
};
