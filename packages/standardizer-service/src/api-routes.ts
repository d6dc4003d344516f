// src/api-routes.ts
import { Router, type Request, type Response } from "express";
import { isConfigurationError, toSnapshotRecord, toWireDecision, type AddTeamResult } from "@team-standardizer/matcher";
import type { ApiResponse } from "@team-standardizer/shared";
import { errorMessage } from "./errors.js";
import {
  addTeamRequestSchema,
  describeIssues,
  jsonValueSchema,
  standardizeRequestSchema,
  thresholdsRequestSchema,
} from "./schemas.js";
import type { StandardizationService } from "./service.js";

// Helper function to send API responses
const sendResponse = <T>(res: Response, data?: T, error?: string, message?: string, status?: number) => {
  const response: ApiResponse<T> = {
    success: !error,
    data,
    error,
    message,
  };
  res.status(status ?? (error ? 400 : 200)).json(response);
};

// Rejected configuration values are the caller's problem, store and unexpected failures the server's
const sendError = (res: Response, error: unknown) => {
  const status = isConfigurationError(error) ? 400 : 500;
  sendResponse(res, undefined, errorMessage(error), undefined, status);
};

const queryString = (req: Request, key: string): string | undefined => {
  const value = req.query[key];
  return typeof value === "string" && value.trim() ? value : undefined;
};

const queryFlag = (req: Request, key: string): boolean | undefined => {
  const value = queryString(req, key)?.toLowerCase();
  if (value === undefined) return undefined;
  return value === "true" || value === "1" || value === "yes";
};

const refusalMessage = (result: Exclude<AddTeamResult, { added: true }>): string => {
  switch (result.reason) {
    case "empty":
      return "Team name is required";
    case "duplicate":
      return `Team '${result.existing}' already exists`;
    case "similar":
      return `Similar team exists: '${result.existing}' (similarity: ${result.score.toFixed(3)}). Use force to add anyway`;
  }
};

export function createApiRouter(service: StandardizationService): Router {
  const router = Router();

  // Middleware to set common headers
  router.use((req, res, next) => {
    res.setHeader("Content-Type", "application/json");
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    next();
  });

  // GET /api/health - Health check
  router.get("/health", (req: Request, res: Response) => {
    sendResponse(res, { status: "ok", teams: service.standardizer.registry.size });
  });

  // GET /api/teams - All canonical names by sport
  router.get("/teams", (req: Request, res: Response) => {
    try {
      sendResponse(res, { teams: service.teamsByCategory(), statistics: service.statistics() });
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/teams/:sport - Canonical names for one sport
  router.get("/teams/:sport", (req: Request, res: Response) => {
    try {
      const { sport } = req.params;
      sendResponse(res, { sport, teams: service.teamsFor(sport) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/teams - Add a team by hand
  router.post("/teams", async (req: Request, res: Response) => {
    try {
      const parsed = addTeamRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) return sendResponse(res, undefined, describeIssues(parsed.error));

      const { team_name, sport, force } = parsed.data;
      const { result, saved } = await service.addTeam(team_name, sport, force);
      if (!result.added) {
        return sendResponse(res, result, refusalMessage(result), undefined, result.reason === "empty" ? 400 : 409);
      }
      sendResponse(res, { ...toSnapshotRecord(result.entry), saved: saved !== null }, undefined, "Team added successfully");
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/standardize - Standardize one name
  router.post("/standardize", (req: Request, res: Response) => {
    try {
      const parsed = standardizeRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) return sendResponse(res, undefined, describeIssues(parsed.error));

      const { team_name, sport, auto_add } = parsed.data;
      const { name, decision } = service.standardize(team_name, sport, auto_add);
      sendResponse(res, { original: team_name, standardized: name, details: toWireDecision(decision) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/process?sport=...&autoSave=... - Standardize every team field in a JSON document
  router.post("/process", async (req: Request, res: Response) => {
    try {
      const parsed = jsonValueSchema.safeParse(req.body);
      if (!parsed.success) return sendResponse(res, undefined, "Request body must be a JSON document");

      const { document, summary, added, saved } = await service.process(parsed.data, {
        sport: queryString(req, "sport"),
        autoAdd: queryFlag(req, "autoAdd"),
        autoSave: queryFlag(req, "autoSave"),
      });
      sendResponse(res, { document, summary, added: added.map(toSnapshotRecord), saved: saved !== null });
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/search?sport=...&q=... - Search canonical names
  router.get("/search", (req: Request, res: Response) => {
    try {
      const sport = queryString(req, "sport");
      const q = queryString(req, "q");
      if (!sport || !q) {
        return sendResponse(res, undefined, "Both sport and q query parameters are required");
      }
      sendResponse(res, service.search(sport, q));
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/save - Persist the registry now
  router.post("/save", async (req: Request, res: Response) => {
    try {
      const receipt = await service.save();
      sendResponse(res, receipt, undefined, `Saved ${receipt.count} teams`);
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/newly-added - Teams added since startup or the last reset
  router.get("/newly-added", (req: Request, res: Response) => {
    const teams = service.newlyAdded().map(toSnapshotRecord);
    sendResponse(res, { count: teams.length, teams });
  });

  // DELETE /api/newly-added - Reset the session log
  router.delete("/newly-added", (req: Request, res: Response) => {
    const cleared = service.clearNewlyAdded();
    sendResponse(res, { cleared }, undefined, `Cleared ${cleared} newly added teams`);
  });

  // GET /api/stats - Registry statistics
  router.get("/stats", (req: Request, res: Response) => {
    sendResponse(res, service.statistics());
  });

  // PUT /api/thresholds - Change thresholds at run time
  router.put("/thresholds", (req: Request, res: Response) => {
    try {
      const parsed = thresholdsRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) return sendResponse(res, undefined, describeIssues(parsed.error));

      const { matching_threshold, auto_add_threshold } = parsed.data;
      const updated = service.updateThresholds({
        ...(matching_threshold !== undefined && { matchThreshold: matching_threshold }),
        ...(auto_add_threshold !== undefined && { autoAddThreshold: auto_add_threshold }),
      });
      sendResponse(res, updated, undefined, "Thresholds updated");
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
