import { ZodError } from "zod";

// Contract Types - Single Source of Truth
import {
  DashboardQueryParamsSchema,
  DashboardResponseSchema,
  FilterSelectionPatchSchema,
  FilterSelectionSchema,
  NO_DATASET_MESSAGE,
  SampleDatasetRequestSchema,
  UploadQueryParamsSchema,
  type ApiErrorResponse,
} from "@shared/contracts/dashboard.contract";

import { DatasetLoadError, generateSampleDataset, parseEmployeeCsv } from "../services/dataset";
import { EmptyViewError } from "../services/dashboard";
import {
  FilterSelectionError,
  NoDatasetError,
  type DashboardSession,
} from "../session/dashboardSession";
import type { IDashboardSessionStore } from "../session/sessionStore";
import type { AppConfig } from "../config";
import { log } from "../log";
import {
  toDashboardResponse,
  toDatasetSummary,
  toFiltersResponse,
} from "./dashboardResponses";

// ============================================================================
// Types
// ============================================================================

/**
 * The parts of an Express request the handlers read.
 * Tests pass plain objects; Express passes its Request.
 */
export interface DashboardRequest {
  sessionID: string;
  /** express-session data; a load marks the session so its cookie is kept */
  session?: { datasetLoadedAt?: string };
  body?: unknown;
  query: Record<string, unknown>;
}

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
  end(): unknown;
}

export interface DashboardControllerDeps {
  sessions: IDashboardSessionStore;
  config: Pick<AppConfig, "sampleRowsMax" | "validateApiContract">;
  /** Clock for loadedAt (tests pin it) */
  now?: () => Date;
}

// ============================================================================
// Error Mapping
// ============================================================================

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Maps known failures to 4xx; everything else is logged and answered with 500.
 */
function sendError(res: JsonResponse, error: unknown, action: string) {
  let status: number;
  let body: ApiErrorResponse;

  if (error instanceof NoDatasetError) {
    status = 404;
    body = { error: "No dataset loaded", message: NO_DATASET_MESSAGE, code: "NO_DATASET" };
  } else if (error instanceof DatasetLoadError) {
    status = 400;
    body = { error: "Dataset load failed", message: error.message, code: "DATASET_LOAD_ERROR" };
  } else if (error instanceof FilterSelectionError) {
    status = 400;
    body = {
      error: "Invalid filter selection",
      message: error.problems.join("; "),
      code: "INVALID_FILTER_SELECTION",
    };
  } else if (error instanceof ZodError) {
    status = 400;
    body = { error: "Invalid request", message: describeZodError(error), code: "INVALID_REQUEST" };
  } else {
    // EmptyViewError lands here too: the pass must short-circuit before aggregating
    const label = error instanceof EmptyViewError ? "Aggregation invariant violated" : "Unexpected error";
    console.error(`[dashboard] ${label} while trying to ${action}:`, error);
    status = 500;
    body = { error: `Failed to ${action}` };
  }

  return res.status(status).json(body);
}

// ============================================================================
// Controller Factory (Dependency Injection)
// ============================================================================

/**
 * Factory for the dataset/dashboard handlers.
 * Every handler runs one synchronous pass over the caller's session.
 */
export function createDashboardController(deps: DashboardControllerDeps) {
  const { sessions, config } = deps;
  const now = deps.now ?? (() => new Date());

  function markEstablished(req: DashboardRequest, loadedAt: Date) {
    if (req.session) {
      req.session.datasetLoadedAt = loadedAt.toISOString();
    }
  }

  function requireSession(req: DashboardRequest): DashboardSession {
    const session = sessions.get(req.sessionID);
    if (!session) {
      throw new NoDatasetError();
    }
    return session;
  }

  /**
   * POST /api/dataset/upload
   *
   * Body: raw delimited text. Query: fileName (optional).
   * A failed parse leaves the current dataset and filters untouched.
   */
  function uploadDataset(req: DashboardRequest, res: JsonResponse) {
    try {
      if (typeof req.body !== "string") {
        return res.status(415).json({
          error: "CSV file expected",
          message: "Send the file as text/csv, text/plain or text/tab-separated-values",
          code: "UNSUPPORTED_MEDIA_TYPE",
        });
      }

      const { fileName } = UploadQueryParamsSchema.parse(req.query);
      const dataset = parseEmployeeCsv(req.body, { fileName, loadedAt: now() });

      const session = sessions.getOrCreate(req.sessionID);
      session.load(dataset);
      markEstablished(req, dataset.loadedAt);
      log(
        `loaded ${dataset.records.length} records from upload${fileName ? ` "${fileName}"` : ""} ` +
          `(${dataset.missingHiringDates} without hiring date)`,
        "dataset"
      );

      return res.status(201).json(toDatasetSummary(session));
    } catch (error) {
      return sendError(res, error, "load dataset");
    }
  }

  /**
   * POST /api/dataset/sample
   *
   * Body: { rows?, seed? }
   */
  function loadSampleDataset(req: DashboardRequest, res: JsonResponse) {
    try {
      const request = SampleDatasetRequestSchema.parse(req.body ?? {});
      if (request.rows !== undefined && request.rows > config.sampleRowsMax) {
        return res.status(400).json({
          error: "Invalid request",
          message: `rows must not exceed ${config.sampleRowsMax}`,
          code: "INVALID_REQUEST",
        });
      }

      const dataset = generateSampleDataset(request, now());
      const session = sessions.getOrCreate(req.sessionID);
      session.load(dataset);
      markEstablished(req, dataset.loadedAt);
      log(`generated ${dataset.records.length} sample records`, "dataset");

      return res.status(201).json(toDatasetSummary(session));
    } catch (error) {
      return sendError(res, error, "generate sample data");
    }
  }

  /**
   * GET /api/dataset
   */
  function getDataset(req: DashboardRequest, res: JsonResponse) {
    try {
      return res.json(toDatasetSummary(requireSession(req)));
    } catch (error) {
      return sendError(res, error, "fetch dataset");
    }
  }

  /**
   * DELETE /api/dataset
   */
  function clearDataset(req: DashboardRequest, res: JsonResponse) {
    sessions.get(req.sessionID)?.clear();
    sessions.delete(req.sessionID);
    if (req.session) {
      req.session.datasetLoadedAt = undefined;
    }
    return res.status(204).end();
  }

  /**
   * GET /api/dashboard/filters
   */
  function getFilters(req: DashboardRequest, res: JsonResponse) {
    try {
      return res.json(toFiltersResponse(requireSession(req)));
    } catch (error) {
      return sendError(res, error, "fetch filters");
    }
  }

  /**
   * PUT /api/dashboard/filters - full selection
   */
  function replaceFilters(req: DashboardRequest, res: JsonResponse) {
    try {
      const selection = FilterSelectionSchema.parse(req.body);
      const session = requireSession(req);
      session.replaceSelection(selection);
      return res.json(toFiltersResponse(session));
    } catch (error) {
      return sendError(res, error, "update filters");
    }
  }

  /**
   * PATCH /api/dashboard/filters - only the given dimensions
   */
  function patchFilters(req: DashboardRequest, res: JsonResponse) {
    try {
      const patch = FilterSelectionPatchSchema.parse(req.body ?? {});
      const session = requireSession(req);
      session.updateSelection(patch);
      return res.json(toFiltersResponse(session));
    } catch (error) {
      return sendError(res, error, "update filters");
    }
  }

  /**
   * POST /api/dashboard/filters/reset
   */
  function resetFilters(req: DashboardRequest, res: JsonResponse) {
    try {
      const session = requireSession(req);
      session.resetFilters();
      return res.json(toFiltersResponse(session));
    } catch (error) {
      return sendError(res, error, "reset filters");
    }
  }

  /**
   * GET /api/dashboard
   *
   * Query: showRawData=true adds the filtered table.
   * An empty view answers 200 with status "empty"; it is not an error.
   */
  function getDashboard(req: DashboardRequest, res: JsonResponse) {
    try {
      const { showRawData } = DashboardQueryParamsSchema.parse(req.query);
      const session = requireSession(req);
      const pass = session.runPass();
      const response = toDashboardResponse(session.getSelection(), pass, showRawData);

      // DEV-Guard: contract validation in development or when explicitly enabled
      if (config.validateApiContract) {
        const check = DashboardResponseSchema.safeParse(response);
        if (!check.success) {
          throw new Error(`Dashboard response violates contract: ${describeZodError(check.error)}`);
        }
      }

      return res.json(response);
    } catch (error) {
      return sendError(res, error, "compute dashboard");
    }
  }

  return {
    uploadDataset,
    loadSampleDataset,
    getDataset,
    clearDataset,
    getFilters,
    replaceFilters,
    patchFilters,
    resetFilters,
    getDashboard,
  };
}

export type DashboardController = ReturnType<typeof createDashboardController>;
