/**
 * Error classes for static resources
 */

export class ResourceReadError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ResourceReadError";
    this.path = path;
  }
}

export class ResourceTransformError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ResourceTransformError";
    this.path = path;
  }
}

export class StaticServerConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StaticServerConfigError";
  }
}
