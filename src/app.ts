import cors from "cors";
import express from "express";
import type { ErrorRequestHandler, RequestHandler } from "express";
import { createLogger } from "./logger";
import { parsePerson, PersonValidationError } from "./person";
import { errorMessage } from "./result";
import type { EligibilityService } from "./service";
import { invokeTool, TOOL_NAMES, ToolNotFoundError } from "./tools";

const log = createLogger("http");

/**
 * Wraps an async route so thrown errors become JSON responses instead of
 * unhandled rejections.
 */
function route(
  fn: (req: express.Request) => Promise<unknown> | unknown
): RequestHandler {
  return async (req, res) => {
    try {
      return res.json(await fn(req));
    } catch (err) {
      if (err instanceof PersonValidationError) {
        return res
          .status(422)
          .json({ error: "Invalid person record", issues: err.issues });
      }
      if (err instanceof ToolNotFoundError) {
        return res
          .status(404)
          .json({ error: err.message, tools: [...TOOL_NAMES] });
      }
      log.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
      return res.status(500).json({ error: errorMessage(err) });
    }
  };
}

const malformedJson: ErrorRequestHandler = (err, _req, res, next) => {
  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: "Malformed JSON body" });
  }
  return next(err);
};

/**
 * Builds the Express app. `fallback`, when given, handles every path no
 * route matched (the Next.js page handler in production).
 */
export function createApp(
  service: EligibilityService,
  opts: { fallback?: RequestHandler } = {}
): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(malformedJson);

  app.get(
    "/status",
    route(() => ({
      message: "Eligibility gateway",
      status: "running",
      modes: ["MCP Protocol", "HTTP API"],
      tools: [...TOOL_NAMES],
    }))
  );

  app.get(
    ["/health", "/healthz"],
    route(() => ({ status: "ok", upstream: service.health }))
  );

  const getToken = route(() => service.getToken());
  app.get("/get_token", getToken);
  app.post("/get_token", getToken);

  app.post(
    "/search_mcid",
    route((req) => service.searchMcid(parsePerson(req.body)))
  );

  app.post(
    "/submit_medical",
    route((req) => service.submitMedical(parsePerson(req.body)))
  );

  app.post(
    "/submit_medical_alt",
    route((req) => service.probeMedicalAuth(parsePerson(req.body)))
  );

  app.post(
    "/debug_transforms",
    route((req) => service.debugTransforms(parsePerson(req.body)))
  );

  app.post(
    "/test_connection",
    route((req) => service.testConnection(parsePerson(req.body)))
  );

  // without a body, /all runs against the sample person
  const all = route((req) => invokeTool(service, "all", req.body));
  app.get("/all", all);
  app.post("/all", all);

  app.post(
    "/tool/:name",
    route((req) => invokeTool(service, req.params.name, req.body))
  );

  if (opts.fallback) app.all("*", opts.fallback);

  return app;
}
