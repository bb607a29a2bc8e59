export interface ServerConfig {
  port: number;
  host: string;
  /** Passed to express.json(); documents above this size are refused. */
  bodyLimit: string;
  /** Log one line per rejected document. */
  logDiagnostics: boolean;
  /** Postgres connection string; the in-memory catalog is used when absent. */
  databaseUrl?: string;
}

const DEFAULT_PORT = 5000;

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return !["false", "0", "no", "off"].includes(value.toLowerCase());
}

// Expects dotenv to have been loaded by the process entrypoint.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || String(DEFAULT_PORT), 10);
  return {
    port: Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT,
    host: env.HOST || "0.0.0.0",
    bodyLimit: env.SPEC_BODY_LIMIT || "1mb",
    logDiagnostics: parseFlag(env.SPEC_LOG_DIAGNOSTICS, true),
    ...(env.DATABASE_URL ? { databaseUrl: env.DATABASE_URL } : {}),
  };
}
