import { readFile } from "node:fs/promises";
import { errorMessage } from "./result";

export const DEFAULT_SERVER_URL = "http://localhost:8000";

export const CLI_TOOLS = [
  "get_token",
  "mcid_search",
  "submit_medical",
  "all",
] as const;

export type CliTool = (typeof CLI_TOOLS)[number];

const TOOLS_WITH_BODY: readonly CliTool[] = ["mcid_search", "submit_medical"];

export const USAGE = `Usage: eligibility-cli <tool> [--url URL] [--body FILE|-]

Tools: ${CLI_TOOLS.join(", ")}

  --url, -u   Base URL of the gateway (default: ${DEFAULT_SERVER_URL})
  --body, -b  JSON file with the person record, or "-" to read stdin
              (required for mcid_search and submit_medical)`;

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--url http://host:8000`
 * - `--url=http://host:8000`
 *
 * Each flag may have a short alias (`-u`). Returns `null` if the flag is
 * not present or has no value.
 */
export function getArgValue(
  argv: readonly string[],
  flag: string,
  alias?: string
): string | null {
  const names = alias ? [flag, alias] : [flag];
  const idx = argv.findIndex((a) =>
    names.some((n) => a === n || a.startsWith(`${n}=`))
  );
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  // "-" alone means stdin, so only reject other dash-prefixed values
  return next && (next === "-" || !next.startsWith("-")) ? next : null;
}

/**
 * First argument that is neither a flag nor a flag's value.
 */
export function getPositional(argv: readonly string[]): string | null {
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a.startsWith("-")) {
      if (!a.includes("=")) i += 1;
      continue;
    }
    return a;
  }
  return null;
}

function isCliTool(name: string): name is CliTool {
  return CLI_TOOLS.some((t) => t === name);
}

export type CliArgs = {
  tool: CliTool;
  url: string;
  body: string | null;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const tool = getPositional(argv);
  if (!tool) throw new CliUsageError("Missing tool name");
  if (!isCliTool(tool)) throw new CliUsageError(`Unknown tool: ${tool}`);

  const body = getArgValue(argv, "--body", "-b");
  if (TOOLS_WITH_BODY.includes(tool) && !body) {
    throw new CliUsageError(`--body is required for tool '${tool}'`);
  }

  return {
    tool,
    url: (getArgValue(argv, "--url", "-u") ?? DEFAULT_SERVER_URL).replace(
      /\/+$/,
      ""
    ),
    body: TOOLS_WITH_BODY.includes(tool) ? body : null,
  };
}

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  readFile: (path: string) => Promise<string>;
  fetchImpl: (url: string, init: RequestInit) => Promise<Response>;
};

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readStdin: readAllStdin,
  readFile: (path) => readFile(path, "utf8"),
  fetchImpl: (url, init) => fetch(url, init),
};

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * CLI entrypoint logic. Returns the process exit code.
 *
 * 1) Parse the tool, server URL and body source.
 * 2) Load the JSON body (file or stdin) for tools that need one.
 * 3) POST it to `<url>/tool/<tool>`.
 * 4) Pretty-print the JSON answer, or the raw text if it is not JSON.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = defaultIo
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    io.stderr(`${errorMessage(e)}\n\n${USAGE}`);
    return 2;
  }

  let payload: unknown = {};
  if (args.body) {
    try {
      const raw =
        args.body === "-" ? await io.readStdin() : await io.readFile(args.body);
      payload = JSON.parse(raw);
    } catch (e) {
      io.stderr(`Error loading JSON body: ${errorMessage(e)}`);
      return 1;
    }
  }

  const endpoint = `${args.url}/tool/${args.tool}`;
  let res: Response;
  try {
    res = await io.fetchImpl(endpoint, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (e) {
    io.stderr(`Request failed: ${errorMessage(e)}`);
    return 1;
  }

  const text = await res.text();
  if (!res.ok) {
    io.stderr(`Request failed: HTTP ${res.status}: ${text}`);
    return 1;
  }

  try {
    io.stdout(JSON.stringify(JSON.parse(text), null, 2));
  } catch {
    io.stdout(text);
  }
  return 0;
}
