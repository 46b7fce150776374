#!/usr/bin/env tsx
import { parseServeArgs } from "./cli.js";
import { HtlStaticServer } from "./server.js";

try {
  const server = new HtlStaticServer(parseServeArgs(process.argv.slice(2)));
  process.once("SIGINT", () => void server.stop());
  process.once("SIGTERM", () => void server.stop());
  await server.start();
} catch (error) {
  console.error("[htl-serve] Failed to start server:", error);
  process.exitCode = 1;
}
