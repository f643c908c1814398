/**
 * Runtime configuration
 *
 * Read once from the environment (.env is loaded by dotenv).
 */

import dotenv from "dotenv";
import path from "path";

dotenv.config();

const ROOT_DIR = path.join(__dirname, "..");

export interface AppConfig {
  port: number;
  dataDir: string;
  uploadDir: string;
  maxUploadBytes: number;
  allowSelfEnrollment: boolean;
  corsOrigins: string[];
  sessionTtlMs: number;
}

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = path.resolve(ROOT_DIR, env.DATA_DIR || "data");

  return {
    port: readNumber(env, "API_PORT", 3001),
    dataDir,
    uploadDir: path.resolve(ROOT_DIR, env.UPLOAD_DIR || path.join(dataDir, "uploads", "assignments")),
    maxUploadBytes: readNumber(env, "MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES),
    allowSelfEnrollment: readBoolean(env, "ALLOW_SELF_ENROLLMENT", false),
    corsOrigins: readList(env, "CORS_ORIGINS", ["http://localhost:5173", "http://localhost:3000"]),
    sessionTtlMs: readNumber(env, "SESSION_TTL_HOURS", 12) * 60 * 60 * 1000,
  };
}
