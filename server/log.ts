import type { RequestHandler } from "express";

export function formatLogLine(message: string, source: string, at: Date = new Date()): string {
  const formattedTime = at.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "server") {
  console.log(formatLogLine(message, source));
}

/**
 * One line per finished /api request: method, path, status, duration.
 */
export function requestLogger(source = "api"): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`, source);
      }
    });

    next();
  };
}
