import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { logParseFailure, parse, render } from "@htl/core";
import * as mime from "mime-types";

import { ResourceReadError, ResourceTransformError } from "./errors.js";
import type { Resource, ResourceTransformer } from "./types.js";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";
export const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

/**
 * Content type for a file, looked up by its extension
 */
export function contentTypeFor(filename: string): string {
  const ext = extname(filename);
  return (ext && mime.contentType(ext)) || DEFAULT_CONTENT_TYPE;
}

/**
 * Compile HTL source to HTML
 */
export function htlToHtml(resource: Resource, filename: string): Resource {
  const source = resource.content.toString("utf8");
  const { tree, error } = parse(source);
  if (error) {
    logParseFailure({
      source: filename,
      reason: error.reason,
      snippet: source,
      error,
    });
    throw new ResourceTransformError(
      `Failed to transform ${filename}: ${error.message}`,
      filename,
      error
    );
  }
  return {
    contentType: HTML_CONTENT_TYPE,
    content: Buffer.from(render(tree), "utf8"),
  };
}

export const transformers: ReadonlyMap<string, ResourceTransformer> = new Map(
  [[".htl", htlToHtml]]
);

/**
 * Load a file, typed by its extension and passed through the transformer
 * registered for that extension, if any
 */
export async function resourceFromFile(
  filename: string,
  registry: ReadonlyMap<string, ResourceTransformer> = transformers
): Promise<Resource> {
  let content: Buffer;
  try {
    content = await readFile(filename);
  } catch (error) {
    throw new ResourceReadError(`Failed to read ${filename}`, filename, error);
  }

  const resource: Resource = {
    contentType: contentTypeFor(filename),
    content,
  };
  const transform = registry.get(extname(filename));
  return transform ? transform(resource, filename) : resource;
}
