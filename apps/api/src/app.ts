import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { getLogger, type Logger } from "@ocr-layout/core";
import type { ApiConfig } from "./config";
import { altoToPage, health, layoutSummary, pageToAlto, respond, type HandlerResult } from "./handlers";

function requestId(req: Request): string {
  const header = req.headers["x-request-id"];
  const given = Array.isArray(header) ? header[0] : header;
  return given || uuidv4();
}

export function createApp(config: ApiConfig, logger: Logger = getLogger("api")): express.Express {
  const app = express();
  app.use(express.json({ limit: config.bodyLimit }));
  app.use(cors());
  app.use(helmet());
  // Access log for failures only
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    const id = requestId(req);
    res.locals.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  });

  const send = (res: Response, result: HandlerResult) => res.status(result.status).json(result.body);
  const log = (res: Response) => logger.child({ request_id: String(res.locals.requestId) });

  app.get("/health", (_req, res) => send(res, health()));

  app.post("/convert/page-to-alto", (req, res) => {
    const l = log(res);
    send(res, respond(() => pageToAlto(req.body, { config, log: l }), l));
  });

  app.post("/convert/alto-to-page", (req, res) => {
    const l = log(res);
    send(res, respond(() => altoToPage(req.body, { config, log: l }), l));
  });

  app.post("/layout/summary", (req, res) => {
    send(res, respond(() => layoutSummary(req.body), log(res)));
  });

  return app;
}
