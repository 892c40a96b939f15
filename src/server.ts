import express, { Request, Response } from "express";
import cors from "cors";
import * as z from "zod";
import { buildPropertyTaxGraph } from "./langgraph/graph.js";
import { TurnRunner } from "./langgraph/session/turn-runner.js";
import { createSessionStore } from "./langgraph/session/store.js";
import { createPropertyTaxApi } from "./langgraph/core/services/tax-api/index.js";
import { createErrorReporter } from "./langgraph/core/services/error-reporting/reporter.js";
import { createLogger } from "./langgraph/core/services/logger.js";
import { loadEnvironment, resolveAppConfig, validateAppConfig } from "./config/appConfig.js";

loadEnvironment();

const logger = createLogger("server");
const appConfig = resolveAppConfig();
validateAppConfig(appConfig);

const graphApp = buildPropertyTaxGraph({
  api: createPropertyTaxApi(appConfig, { logger: createLogger("tax-api") }),
  reporter: createErrorReporter(appConfig, createLogger("error-reporter")),
  messagesPath: appConfig.messagesPath,
});
const runner = new TurnRunner(graphApp, createSessionStore(appConfig));

const app = express();

app.use(cors());
app.use(express.json());

const ChatRequestSchema = z.object({
  sessionId: z.string().min(1),
  payload: z.record(z.string(), z.unknown()).default({}),
});

app.post("/chat", async (req: Request, res: Response) => {
  const parsed = ChatRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
  }
  try {
    const response = await runner.runTurn(parsed.data.sessionId, parsed.data.payload);
    return res.json(response);
  } catch (error) {
    logger.error({ err: error, sessionId: parsed.data.sessionId }, "chat request failed");
    return res.status(500).json({ error: "Error processing request" });
  }
});

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", fakeApi: appConfig.useFakeApi });
});

app.listen(appConfig.port, () => {
  logger.info({ port: appConfig.port, sessionStore: appConfig.sessionStore.kind }, "server started");
});
