import type { Express, NextFunction, Request, Response } from "express";
import type { Server } from "http";
import cookieParser from "cookie-parser";
import { POI_FORM_SECTION, TRIP_FORM_SECTIONS } from "@shared/tripFields";
import { NEW_TRIP_SENTINEL } from "@shared/schema";
import { getConfig, getUsers, type AppConfig, type Lookup, type UsersMap } from "./config";
import { createTripStore, type ITripStore } from "./storage";
import { SessionStore } from "./services/tripSession";
import { getAIClient, type AIClient } from "./services/aiClientFactory";
import { generalRateLimiter } from "./middleware/rateLimiter";
import { createAuthRouter } from "./routes/auth";
import { createTripsRouter } from "./routes/trips";
import { createPlannerRouter } from "./routes/planner";

/** Collaborators shared by every router; tests swap in their own */
export interface AppDeps {
  config: AppConfig;
  store: ITripStore;
  sessions: SessionStore;
  getUsers: () => Lookup<UsersMap>;
  getAIClient: () => Lookup<AIClient>;
}

export function createDefaultDeps(config: AppConfig = getConfig()): AppDeps {
  return {
    config,
    store: createTripStore(config),
    sessions: new SessionStore(),
    getUsers: () => getUsers(config),
    getAIClient: () => getAIClient(config),
  };
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  deps: AppDeps = createDefaultDeps(),
): Promise<Server> {
  app.use(cookieParser());
  app.use("/api", generalRateLimiter);

  app.use("/api/auth", createAuthRouter(deps));
  app.use("/api/trips", createTripsRouter(deps));
  app.use("/api/planner", createPlannerRouter(deps));

  // Field layout for the planner form; public so the login page can preload it
  app.get("/api/form-layout", (_req: Request, res: Response) => {
    res.json({
      newTripName: NEW_TRIP_SENTINEL,
      sections: TRIP_FORM_SECTIONS,
      pointOfInterest: POI_FORM_SECTION,
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    console.error("[express] Unhandled error:", err);
    res.status(status).json({ message });
  });

  return httpServer;
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}
