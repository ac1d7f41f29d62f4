import express, { type Express, type RequestHandler } from "express";
import type { DashboardController } from "./controllers/dashboardController";

export const UPLOAD_CONTENT_TYPES = [
  "text/csv",
  "text/plain",
  "text/tab-separated-values",
  "application/octet-stream",
];

export interface RouteOptions {
  maxUploadBytes: number;
  /** Applied to both ways of loading a dataset */
  datasetRateLimiter: RequestHandler;
}

export function registerRoutes(
  app: Express,
  controller: DashboardController,
  options: RouteOptions
): Express {
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Dataset
  app.post(
    "/api/dataset/upload",
    options.datasetRateLimiter,
    express.text({ type: UPLOAD_CONTENT_TYPES, limit: options.maxUploadBytes }),
    (req, res) => {
      controller.uploadDataset(req, res);
    }
  );
  app.post("/api/dataset/sample", options.datasetRateLimiter, (req, res) => {
    controller.loadSampleDataset(req, res);
  });
  app.get("/api/dataset", (req, res) => {
    controller.getDataset(req, res);
  });
  app.delete("/api/dataset", (req, res) => {
    controller.clearDataset(req, res);
  });

  // Filters
  app.get("/api/dashboard/filters", (req, res) => {
    controller.getFilters(req, res);
  });
  app.put("/api/dashboard/filters", (req, res) => {
    controller.replaceFilters(req, res);
  });
  app.patch("/api/dashboard/filters", (req, res) => {
    controller.patchFilters(req, res);
  });
  app.post("/api/dashboard/filters/reset", (req, res) => {
    controller.resetFilters(req, res);
  });

  // Dashboard
  app.get("/api/dashboard", (req, res) => {
    controller.getDashboard(req, res);
  });

  return app;
}
