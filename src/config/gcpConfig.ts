import dotenv from "dotenv";
import type { GCPConfig } from "../types";

dotenv.config();

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export const gcpConfig: GCPConfig = {
  // Unset means Application Default Credentials
  keyFilename: process.env.GOOGLE_APPLICATION_CREDENTIALS || undefined,
};

export const PORT = numberFromEnv("PORT", 8080);

// Configuration constants
export const OPERATION_TIMEOUT_MS = numberFromEnv(
  "OPERATION_TIMEOUT_MS",
  300 * 1000
); // 5 minutes
export const OPERATION_POLL_INTERVAL_MS = numberFromEnv(
  "OPERATION_POLL_INTERVAL_MS",
  2 * 1000
);
export const LIST_PAGE_SIZE = numberFromEnv("LIST_PAGE_SIZE", 50);

export const CORS_ORIGINS = (process.env.CORS_ORIGINS || "*")
  .split(",")
  .map((origin) => origin.trim())
  .filter(Boolean);
