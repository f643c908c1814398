/**
 * Express app factory
 *
 * Builds the app around explicitly provided stores and storage so that the
 * server, scripts and tests each choose their own data directory.
 */

import express, { Express } from "express";
import cors from "cors";

import { AppConfig } from "../config";
import { Stores } from "../stores";
import { ArtifactStorage } from "../storage/artifactStorage";
import { createServices } from "../services";
import { ApiDeps } from "./deps";
import { SessionRegistry } from "./sessions";
import { createAuthRouter } from "./routes/auth";
import { createClassesRouter } from "./routes/classes";
import { createAssignmentsRouter } from "./routes/assignments";
import { createDashboardRouter, createGradesRouter, createNotificationsRouter } from "./routes/me";

export interface AppOptions {
  config: AppConfig;
  stores: Stores;
  storage: ArtifactStorage;
  now?: () => Date;
}

/**
 * JSON body limit: the largest upload, base64-encoded, plus room for the other fields
 */
export function bodyLimit(maxUploadBytes: number): number {
  return Math.ceil(maxUploadBytes / 3) * 4 + 64 * 1024;
}

export function createApp({ config, stores, storage, now }: AppOptions): { app: Express; deps: ApiDeps } {
  const services = createServices({
    stores,
    storage,
    allowSelfEnrollment: config.allowSelfEnrollment,
    maxUploadBytes: config.maxUploadBytes,
    now: now ?? (() => new Date()),
  });
  const sessions = new SessionRegistry(config.sessionTtlMs);
  const deps: ApiDeps = { stores, services, sessions };

  const app = express();

  // Middleware
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: bodyLimit(config.maxUploadBytes) }));

  // Routes
  app.use("/api/auth", createAuthRouter(deps));
  app.use("/api/dashboard", createDashboardRouter(deps));
  app.use("/api/classes", createClassesRouter(deps));
  app.use("/api/assignments", createAssignmentsRouter(deps));
  app.use("/api/grades", createGradesRouter(deps));
  app.use("/api/notifications", createNotificationsRouter(deps));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return { app, deps };
}
