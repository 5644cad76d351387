import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { v4 as uuidv4 } from "uuid";
import type { CaptureCoordinator } from "../capture/coordinator";
import { parseCaptureRequest } from "../capture/capture-schemas";
import { CaptureValidationError, PrimaryCaptureError } from "../capture/errors";
import type { ImageStorage } from "../storage/image-storage";
import { ImageNotFoundError, InvalidImageReferenceError } from "../storage/errors";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";

export type HttpEnv = {
  Variables: {
    logger: Logger;
  };
};

export interface HttpAppDeps {
  coordinator: Pick<CaptureCoordinator, "capture">;
  storage: Pick<ImageStorage, "resolve">;
  logger?: Logger;
}

/** Status and public message for an error raised by a handler. */
export function errorStatus(error: Error): { status: 400 | 404 | 500; message: string } {
  if (error instanceof CaptureValidationError || error instanceof InvalidImageReferenceError) {
    return { status: 400, message: error.message };
  }
  if (error instanceof ImageNotFoundError) {
    return { status: 404, message: error.message };
  }
  if (error instanceof PrimaryCaptureError) {
    return { status: 500, message: error.message };
  }
  return { status: 500, message: "Internal server error." };
}

function readJsonBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new CaptureValidationError("Request body must be valid JSON.");
  }
}

/** Routes without a listener, so tests can drive them through `app.request`. */
export function createHttpApp({ coordinator, storage, logger = rootLogger }: HttpAppDeps) {
  const httpLogger = logger.child({ component: "Server" });
  const app = new Hono<HttpEnv>();

  app.use("*", async (c, next) => {
    const traceId = c.req.header("x-request-id") || uuidv4();
    const requestLogger = httpLogger.withContext({ traceId, spanId: uuidv4().slice(0, 8) });
    c.set("logger", requestLogger);
    c.header("X-Request-Id", traceId);

    const startedAt = Date.now();
    await next();
    requestLogger.debug("Request handled", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    });
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    const { status, message } = errorStatus(err);
    const requestLogger = c.get("logger");
    if (status === 500 && !(err instanceof PrimaryCaptureError)) {
      requestLogger.error("Unhandled request error", err, { path: c.req.path });
    } else {
      requestLogger.warn("Request rejected", { path: c.req.path, status, error: message });
    }
    return c.json({ error: message }, status);
  });

  app.get("/health", (c) => c.json({ status: "healthy", service: "camera" }));

  app.post("/capture", async (c) => {
    const request = parseCaptureRequest(readJsonBody(await c.req.text()));
    const response = await coordinator.capture(request, c.get("logger"));
    return c.json(response, 200);
  });

  app.get("/api/images/:filename", async (c) => {
    const image = await storage.resolve(c.req.param("filename"));
    return new Response(image.bytes, {
      status: 200,
      headers: { "Content-Type": image.mediaType, "Content-Length": String(image.bytes.length) },
    });
  });

  app.notFound((c) => c.json({ error: "Not found." }, 404));

  return app;
}

export type HttpApp = ReturnType<typeof createHttpApp>;
