import dotenv from "dotenv";

dotenv.config();

/**
 * Server settings loaded from the environment.
 * Database settings are read by config/db.ts.
 */
export interface Settings {
  nodeEnv: string;
  isProd: boolean;
  /** First port to try; the server walks upward when it is taken */
  port: number;
  /** How many higher ports to try before giving up */
  maxPortAttempts: number;
  clientOrigin: string;
  /** Exact origins (and their hostnames) allowed by CORS */
  allowedOrigins: string[];
  trustProxy: number;
}

function getEnvOrDefault(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

function parseIntOr(raw: string, fallback: number): number {
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function loadSettings(): Settings {
  const nodeEnv = getEnvOrDefault("NODE_ENV", "development");
  const clientOrigin = getEnvOrDefault("CLIENT_ORIGIN", "http://localhost:5173");
  const allowedOrigins = getEnvOrDefault("ALLOWED_ORIGINS", clientOrigin)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  return Object.freeze({
    nodeEnv,
    isProd: nodeEnv === "production",
    port: parseIntOr(getEnvOrDefault("PORT", "5000"), 5000),
    maxPortAttempts: parseIntOr(getEnvOrDefault("PORT_ATTEMPTS", "10"), 10),
    clientOrigin,
    allowedOrigins,
    trustProxy: parseIntOr(getEnvOrDefault("TRUST_PROXY", "1"), 1),
  });
}

const settings = loadSettings();

export default settings;
