import { DEFAULT_FEE_BPS, MAX_FEE_BPS } from "./services/fees";

export type LedgerBackend = "mongo" | "memory";

export interface Config {
  PORT: number;
  MONGO_URI: string;
  LEDGER_BACKEND: LedgerBackend;
  API_KEY: string;
  FRONTEND_URL: string;
  PLATFORM_OWNER: string;
  FEE_RECIPIENT: string;
  PLATFORM_FEE_BPS: number;
  INITIAL_VERIFIERS: string[];
  RATE_LIMIT_MAX: number;
}

const parseBackend = (value: string): LedgerBackend => {
  if (value !== "mongo" && value !== "memory") {
    throw new Error(`LEDGER_BACKEND must be "mongo" or "memory", got "${value}"`);
  }
  return value;
};

const parseFeeBps = (value: string): number => {
  const feeBps = Number(value);
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
    throw new Error(`PLATFORM_FEE_BPS must be a whole number between 0 and ${MAX_FEE_BPS}, got "${value}"`);
  }
  return feeBps;
};

const parseList = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export const getConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const owner = (env.PLATFORM_OWNER || "").trim();

  const config: Config = {
    PORT: parseInt(env.PORT || "5000", 10),
    MONGO_URI: env.MONGO_URI || "mongodb://localhost:27017/research-ledger?replicaSet=rs0",
    LEDGER_BACKEND: parseBackend(env.LEDGER_BACKEND || "mongo"),
    API_KEY: env.API_KEY || "",
    FRONTEND_URL: env.FRONTEND_URL || "",
    PLATFORM_OWNER: owner,
    FEE_RECIPIENT: (env.FEE_RECIPIENT || "").trim() || owner, // the owner collects fees unless told otherwise
    PLATFORM_FEE_BPS: parseFeeBps(env.PLATFORM_FEE_BPS || String(DEFAULT_FEE_BPS)),
    INITIAL_VERIFIERS: parseList(env.INITIAL_VERIFIERS || ""),
    RATE_LIMIT_MAX: Number(env.RATE_LIMIT_MAX) || 1000,
  };

  if (isNaN(config.PORT) || config.PORT < 0) {
    throw new Error(`PORT must be a port number, got "${env.PORT}"`);
  }

  const requiredVars: Array<keyof Config> = ["API_KEY", "PLATFORM_OWNER", "MONGO_URI"];
  for (const varName of requiredVars) {
    if (!config[varName]) {
      throw new Error(`Missing required environment variable: ${varName}`);
    }
  }

  return config;
};
