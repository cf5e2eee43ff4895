export type StatusPolicyName = "permissive" | "strict";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  mongoUri: string;
  mongoDbName: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  frontendUrl: string;
  ownerEmail: string;
  ownerPassword: string;
  timeZone: string;
  feedbackMaxLength: number;
  statusPolicy: StatusPolicyName;
  zeroStockUnlimited: boolean;
  bcryptRounds: number;
}

type Env = Record<string, string | undefined>;

const readInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const readBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const readStatusPolicy = (value: string | undefined): StatusPolicyName => {
  if (value === undefined || value.trim() === "") {
    return "permissive";
  }
  const policy = value.trim().toLowerCase();
  if (policy === "permissive" || policy === "strict") {
    return policy;
  }
  throw new Error(`STATUS_POLICY must be "permissive" or "strict", got "${value}"`);
};

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

// Reads settings from process.env (dotenv is loaded in server.ts)
export const loadConfig = (env: Env = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || "development";
  const jwtSecret = env.JWT_SECRET || "";

  if (!jwtSecret && nodeEnv === "production") {
    throw new Error("JWT_SECRET must be set in production");
  }

  const timeZone = env.TIME_ZONE || "Asia/Kolkata";
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`TIME_ZONE "${timeZone}" is not a valid IANA time zone`);
  }

  return {
    port: readInt(env.PORT, 5000),
    nodeEnv,
    mongoUri: env.MONGODB_URI || "mongodb://localhost:27017",
    mongoDbName: env.MONGODB_DB_NAME || "snack_counter",
    jwtSecret: jwtSecret || "dev-secret",
    jwtExpiresInSeconds: readInt(env.JWT_EXPIRES_IN_SECONDS, 7 * 24 * 60 * 60),
    frontendUrl: env.FRONTEND_URL || "http://localhost:5173",
    ownerEmail: (env.OWNER_EMAIL || "owner@example.com").trim().toLowerCase(),
    ownerPassword: env.OWNER_PASSWORD || "change-me",
    timeZone,
    feedbackMaxLength: readInt(env.FEEDBACK_MAX_LENGTH, 350),
    statusPolicy: readStatusPolicy(env.STATUS_POLICY),
    zeroStockUnlimited: readBool(env.ZERO_STOCK_UNLIMITED, true),
    bcryptRounds: readInt(env.BCRYPT_ROUNDS, 10),
  };
};
