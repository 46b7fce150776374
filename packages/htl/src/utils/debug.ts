export type DebugLevel = "off" | "parse";

function normalizeBooleanString(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return;
}

/**
 * Read the debug level from `HTL_DEBUG` ("parse", "off" or a boolean)
 */
export function getDebugLevel(
  env: NodeJS.ProcessEnv = process.env
): DebugLevel {
  const envLower = (env.HTL_DEBUG ?? "off").trim().toLowerCase();
  if (envLower === "parse" || envLower === "off") {
    return envLower;
  }
  return normalizeBooleanString(envLower) === true ? "parse" : "off";
}

function color(code: number) {
  return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

// ANSI color codes
const ANSI_GRAY = 90;
const ANSI_YELLOW = 33;
const ANSI_CYAN = 36;
const ANSI_BG_BLUE = 44;

const cGray = color(ANSI_GRAY);
const cYellow = color(ANSI_YELLOW);
const cCyan = color(ANSI_CYAN);
const cBgBlue = color(ANSI_BG_BLUE);

const MAX_SNIPPET_LENGTH = 800;

export function truncateSnippet(snippet: string): string {
  if (snippet.length <= MAX_SNIPPET_LENGTH) {
    return snippet;
  }
  return `${snippet.slice(0, MAX_SNIPPET_LENGTH)}\n…[truncated ${snippet.length - MAX_SNIPPET_LENGTH} chars]`;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `\n${error.name}: ${error.message}`;
  }
  return `\n${String(error)}`;
}

/**
 * Print a parse failure to stderr when `HTL_DEBUG=parse`
 */
export function logParseFailure({
  source,
  reason,
  snippet,
  error,
}: {
  source: string;
  reason: string;
  snippet?: string;
  error?: unknown;
}): void {
  if (getDebugLevel() !== "parse") {
    return;
  }

  console.error(cGray("[debug:htl:fail]"), cBgBlue(`[${source}]`), cYellow(reason));

  if (snippet) {
    console.error(cGray("[debug:htl:fail:snippet]"), truncateSnippet(snippet));
  }

  if (error) {
    console.error(cGray("[debug:htl:fail:error]"), cCyan(formatError(error)));
  }
}
