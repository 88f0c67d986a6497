// src/config.ts
import path from "path";

export type AppConfig = {
  dataDir: string;
  startingBalance: number;
  defaultAdmin: { username: string; password: string };
};

export const DEFAULT_STARTING_BALANCE = 1000;

/**
 * Reads settings from the environment. Call dotenv.config() first so a .env file is honoured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const startingBalance = Number(env.HOTEL_STARTING_BALANCE || DEFAULT_STARTING_BALANCE);
  if (!Number.isFinite(startingBalance) || startingBalance < 0) {
    throw new Error(`HOTEL_STARTING_BALANCE must be a non-negative number, got "${env.HOTEL_STARTING_BALANCE}"`);
  }

  return {
    dataDir: path.resolve(env.HOTEL_DATA_DIR || process.cwd()),
    startingBalance,
    defaultAdmin: {
      username: env.HOTEL_ADMIN_USERNAME || "admin",
      password: env.HOTEL_ADMIN_PASSWORD || "admin",
    },
  };
}
