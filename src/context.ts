// src/context.ts
import type { AppConfig } from "./config";
import type { Database } from "./db";
import type { Prompter } from "./prompt";

export type AppContext = {
  db: Database;
  io: Prompter;
  config: AppConfig;
};

export type Handler = (ctx: AppContext) => Promise<void>;
