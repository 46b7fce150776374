import { z } from "zod";

import { StaticServerConfigError } from "./errors.js";

export const staticServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65_535).default(8000),
  host: z.string().min(1).default("localhost"),
  /** Later directories win when two contain the same path */
  dirs: z.array(z.string().min(1)).min(1).default(["static"]),
  /** Route also served at `/` */
  index: z.string().startsWith("/").default("/index.htl"),
  dev: z.boolean().default(false),
  cors: z.boolean().default(false),
});

export type StaticServerConfig = z.infer<typeof staticServerConfigSchema>;
export type StaticServerConfigInput = z.input<typeof staticServerConfigSchema>;

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return;
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Apply defaults and validate. `HTL_DEV` and `HTL_CORS` override the
 * matching options when set.
 */
export function resolveConfig(
  input: StaticServerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): StaticServerConfig {
  const dev = envFlag(env.HTL_DEV);
  const cors = envFlag(env.HTL_CORS);

  const result = staticServerConfigSchema.safeParse({
    ...input,
    ...(dev !== undefined ? { dev } : {}),
    ...(cors !== undefined ? { cors } : {}),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new StaticServerConfigError(
      `Invalid server configuration: ${issues}`,
      result.error
    );
  }

  return result.data;
}
