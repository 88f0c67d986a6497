#!/usr/bin/env node
// src/index.ts
import dotenv from "dotenv";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { Database } from "./db";
import { EndOfInputError, errorMessage } from "./errors";
import { runMenu } from "./menu";
import { createConsolePrompter } from "./prompt";
import { mainMenu } from "./routes";

dotenv.config();

/**
 * Loads both data files, seeding the ones that do not exist yet.
 * A file that exists but cannot be parsed stops the program.
 */
function openDatabase(config: AppConfig): Database {
  const db = new Database(config);
  const { seededUsers, seededRooms } = db.load();
  if (seededUsers) console.log(`No users file in ${config.dataDir}, created it with the default admin account.`);
  if (seededRooms) console.log(`No rooms file in ${config.dataDir}, created an empty room list.`);
  return db;
}

(async () => {
  let db: Database;
  let config: AppConfig;
  try {
    config = loadConfig();
    db = openDatabase(config);
  } catch (err) {
    console.error("Failed to start:", errorMessage(err));
    process.exit(1);
  }

  const io = createConsolePrompter();
  try {
    await runMenu({ db, io, config }, mainMenu);
  } catch (err) {
    if (!(err instanceof EndOfInputError)) throw err;
  } finally {
    io.close();
  }
  process.exit(0);
})().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
