import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandler } from "express";
import next from "next";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createMcpServer } from "./mcp";
import { errorMessage } from "./result";
import { EligibilityService } from "./service";

const log = createLogger("server");

type Mode = "hybrid" | "http" | "mcp";

function getMode(argv: string[]): Mode {
  if (argv.includes("--http-only")) return "http";
  if (argv.includes("--mcp-only")) return "mcp";
  return "hybrid";
}

/**
 * Prepares the Next.js tool console and returns its request handler.
 */
async function prepareUi(): Promise<RequestHandler> {
  const dev = process.env.NODE_ENV !== "production";
  const ui = next({ dev });
  const handle = ui.getRequestHandler();
  await ui.prepare();
  return (req, res, fail) => {
    handle(req, res).catch(fail);
  };
}

async function startHttp(
  service: EligibilityService,
  port: number,
  withUi: boolean
): Promise<void> {
  const flags = await service.checkConnectivity();
  log.info(
    `upstream reachability: token=${flags.token} mcid=${flags.mcid} medical=${flags.medical}`
  );

  const fallback = withUi ? await prepareUi() : undefined;
  const app = createApp(service, { fallback });

  await new Promise<void>((resolve) => {
    app.listen(port, () => {
      log.info(`HTTP API ready on http://localhost:${port} (ui=${withUi})`);
      resolve();
    });
  });
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const mode = getMode(argv);
  const config = loadConfig();
  const service = EligibilityService.fromConfig(config);

  if (mode !== "mcp") {
    await startHttp(service, config.port, !argv.includes("--no-ui"));
  }

  if (mode !== "http") {
    const mcp = createMcpServer(service);
    await mcp.connect(new StdioServerTransport());
    log.info("MCP server running on stdio");
  }
}

main().catch((err) => {
  log.error(`Fatal server error: ${errorMessage(err)}`);
  process.exit(1);
});
