function optionalEnv(key: string, defaultValue = ""): string {
  return process.env[key] ?? defaultValue;
}

function intEnv(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return defaultValue;
  const val = parseInt(raw, 10);
  if (Number.isNaN(val)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  return val;
}

const ENVIRONMENTS = ["development", "test", "production"] as const;
const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export interface Config {
  readonly env: (typeof ENVIRONMENTS)[number];
  readonly port: number;
  readonly host: string;
  readonly logLevel: (typeof LOG_LEVELS)[number];

  // Rate limiting
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;

  /** Largest accepted request body; descriptions are small */
  readonly bodyLimit: number;
  /** Upper bound on paradigm cells per request */
  readonly maxParadigmCells: number;
}

export function loadConfig(): Config {
  const env = oneOf("NODE_ENV", ENVIRONMENTS, "development");

  return {
    env,
    port: intEnv("PORT", 3001),
    host: optionalEnv("HOST", "0.0.0.0"),
    logLevel: oneOf("LOG_LEVEL", LOG_LEVELS, env === "production" ? "info" : "debug"),

    rateLimitMax: intEnv("RATE_LIMIT_MAX", 100),
    rateLimitWindowMs: intEnv("RATE_LIMIT_WINDOW_MS", 60_000),

    bodyLimit: intEnv("BODY_LIMIT_BYTES", 512 * 1024),
    maxParadigmCells: intEnv("MAX_PARADIGM_CELLS", 2_000),
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) throw new Error("Config not initialized. Call initConfig() first.");
  return _config;
}

export function initConfig(overrides: Partial<Config> = {}): Config {
  _config = { ...loadConfig(), ...overrides };
  return _config;
}

// ─── Internals ────────────────────────────────────────────────────────────────

function oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = optionalEnv(key, defaultValue);
  const match = allowed.find(a => a === raw);
  if (match === undefined) throw new Error(`Environment variable ${key} must be one of ${allowed.join(", ")}, got "${raw}"`);
  return match;
}
