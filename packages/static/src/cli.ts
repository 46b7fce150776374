import { parseArgs } from "node:util";

import type { StaticServerConfigInput } from "./config.js";

/**
 * Map `htl-serve` flags to server options. `--dirs` is colon-separated.
 */
export function parseServeArgs(argv: string[]): StaticServerConfigInput {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: "string", short: "p" },
      host: { type: "string" },
      dirs: { type: "string", short: "d" },
      index: { type: "string" },
      dev: { type: "boolean" },
      cors: { type: "boolean" },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    ...(values.port !== undefined ? { port: Number(values.port) } : {}),
    ...(values.host !== undefined ? { host: values.host } : {}),
    ...(values.dirs !== undefined
      ? { dirs: values.dirs.split(":").filter((dir) => dir !== "") }
      : {}),
    ...(values.index !== undefined ? { index: values.index } : {}),
    ...(values.dev !== undefined ? { dev: values.dev } : {}),
    ...(values.cors !== undefined ? { cors: values.cors } : {}),
  };
}
