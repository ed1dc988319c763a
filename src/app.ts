import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { CORS_ORIGINS } from "./config/gcpConfig";
import type { ErrorResponse, InstancesApiFactory, TransitionResult } from "./types";
import { listInstances, setInstanceStates } from "./utils/computeUtils";
import {
  OperationFailedError,
  OperationTimeoutError,
  RequestValidationError,
  StateTransitionError,
} from "./utils/errors";
import logger from "./utils/logger";
import type { WaitOptions } from "./utils/operationWaiter";
import {
  parseListInstancesQuery,
  parseSetStatePayload,
  toSortedJson,
} from "./utils/validation";

export interface AppOptions {
  /** Called once per request; each request gets its own clients */
  instancesApiFactory: InstancesApiFactory;
  /** Wait bounds for start/stop operations */
  waitOptions?: WaitOptions;
}

interface FailureBody extends ErrorResponse {
  details?: RequestValidationError["issues"];
  completed?: TransitionResult[];
}

function describeFailure(err: Error): { status: number; body: FailureBody } {
  if (err instanceof RequestValidationError) {
    return {
      status: 422,
      body: {
        success: false,
        error: err.kind,
        message: "Invalid request",
        details: err.issues,
      },
    };
  }

  // Body parser failures (malformed JSON, oversized payload)
  if ("status" in err && typeof err.status === "number" && err.status < 500) {
    return {
      status: err.status,
      body: { success: false, error: "Bad Request", message: err.message },
    };
  }

  const cause = err instanceof StateTransitionError ? err.cause : err;
  const completed =
    err instanceof StateTransitionError ? err.completed : undefined;
  const kind =
    err instanceof StateTransitionError ||
    err instanceof OperationTimeoutError ||
    err instanceof OperationFailedError
      ? err.kind
      : undefined;

  if (kind) {
    return {
      status: 500,
      body: { success: false, error: kind, message: cause.message, completed },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: "Internal Server Error",
      message:
        process.env.NODE_ENV === "development"
          ? cause.message
          : "Something went wrong",
      completed,
    },
  };
}

export function createApp({ instancesApiFactory, waitOptions }: AppOptions) {
  const app = express();

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const requestId = logger.getRequestId(req);
    res.locals.requestId = requestId;

    logger.debug(`[${requestId}] ${req.method} ${req.path}`, {
      userAgent: req.get("User-Agent") || "Unknown",
      ip: req.ip,
    });

    res.on("finish", () => {
      const duration = Date.now() - start;
      logger.info(
        `[${requestId}] ${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`
      );
    });

    next();
  });

  app.use(
    cors({
      origin: CORS_ORIGINS.includes("*") ? "*" : CORS_ORIGINS,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Request-Id"],
    })
  );

  app.use(express.json());

  app.get("/ping", (req: Request, res: Response) => {
    res.status(200).json({ key: "value" });
  });

  // Health check endpoint
  app.get("/health", (req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      timestamp: Date.now(),
      uptime: process.uptime(),
    });
  });

  app.get(
    "/get_compute_engine",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const requestId = String(res.locals.requestId);
      try {
        const projectId = parseListInstancesQuery(req.query);
        const listing = await listInstances(
          instancesApiFactory(),
          projectId,
          requestId
        );
        res.status(200).type("application/json").send(toSortedJson(listing));
      } catch (error) {
        next(error);
      }
    }
  );

  app.post(
    "/set_state",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const requestId = String(res.locals.requestId);
      try {
        const payload = parseSetStatePayload(req.body);
        await setInstanceStates(
          instancesApiFactory(),
          payload,
          requestId,
          waitOptions
        );
        res.status(200).json({ results: "status set" });
      } catch (error) {
        next(error);
      }
    }
  );

  // 404 handler
  app.use((req: Request, res: Response) => {
    logger.warn(`404 - Endpoint not found: ${req.method} ${req.path}`);
    res.status(404).json({
      success: false,
      error: "Not Found",
      message: "Endpoint not found",
    });
  });

  // Error handling middleware
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = describeFailure(err);
    const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[${String(res.locals.requestId)}] Request failed`, {
      method: req.method,
      url: req.url,
      status,
      error: err.name,
      message: err.message,
    });

    res.status(status).json(body);
  });

  return app;
}
