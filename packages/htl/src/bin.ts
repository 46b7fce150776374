#!/usr/bin/env tsx
import { readAll, runCli } from "./cli.js";

const input = await readAll(process.stdin);
process.exitCode = runCli(input, process);
