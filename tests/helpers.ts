import fs from "fs";
import os from "os";
import path from "path";
import type { AppConfig } from "../src/config";
import type { AppContext } from "../src/context";
import { Database } from "../src/db";
import { EndOfInputError } from "../src/errors";
import type { Prompter } from "../src/prompt";

/** Answers prompts from a fixed script and records everything printed. */
export class ScriptedPrompter implements Prompter {
  readonly lines: string[] = [];
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string) {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new EndOfInputError();
    return answer.trim();
  }

  print(message = "") {
    this.lines.push(message);
  }

  close() {}

  get remaining() {
    return this.answers.length;
  }
}

export function makeTempDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), "hotel-desk-"));
}

export function testConfig(dataDir: string): AppConfig {
  return { dataDir, startingBalance: 1000, defaultAdmin: { username: "admin", password: "admin" } };
}

export function openTestDb(dataDir = makeTempDir()) {
  const db = new Database(testConfig(dataDir));
  db.load();
  return db;
}

export function makeContext(answers: string[], db = openTestDb()): AppContext & { io: ScriptedPrompter } {
  return { db, io: new ScriptedPrompter(answers), config: testConfig(path.dirname(db.users.filePath)) };
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}
