import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join, relative, sep } from "node:path";

import type { FastifyReply } from "fastify";

import { ResourceReadError } from "./errors.js";
import { resourceFromFile } from "./resource.js";
import type {
  HandlerOptions,
  Resource,
  ResourceHandler,
} from "./types.js";

function send(reply: FastifyReply, resource: Resource): FastifyReply {
  return reply.header("Content-Type", resource.contentType).send(resource.content);
}

/**
 * Build the request handler for one file. In dev mode the file is read
 * and transformed on each request; otherwise it is loaded once, here,
 * and load errors reject.
 */
export async function handlerFromFile(
  filename: string,
  options: HandlerOptions = {}
): Promise<ResourceHandler> {
  const logger = options.logger ?? console;

  if (options.dev) {
    return async (_request, reply) => {
      try {
        const resource = await resourceFromFile(filename, options.transformers);
        return send(reply, resource);
      } catch (error) {
        logger.error(`[htl-serve] Failed to load ${filename}:`, error);
        return reply.code(500).send();
      }
    };
  }

  const resource = await resourceFromFile(filename, options.transformers);
  return async (_request, reply) => send(reply, resource);
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/**
 * Regular files below `dir`, depth first, in name order
 */
export async function listFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new ResourceReadError(`Failed to read directory ${dir}`, dir, error);
  }

  const files: string[] = [];
  for (const entry of entries.sort(byName)) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * URL path of `file` relative to the directory it was found in
 */
export function routeFor(dir: string, file: string): string {
  return `/${relative(dir, file).split(sep).join("/")}`;
}

/**
 * Map every file below `dirs` to a handler, keyed by route. A route found
 * in a later directory replaces the earlier one.
 */
export async function handlersFromDirs(
  dirs: readonly string[],
  options: HandlerOptions = {}
): Promise<Map<string, ResourceHandler>> {
  const handlers = new Map<string, ResourceHandler>();
  for (const dir of dirs) {
    for (const file of await listFiles(dir)) {
      handlers.set(routeFor(dir, file), await handlerFromFile(file, options));
    }
  }
  return handlers;
}
