// src/db.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import type { AppConfig } from "./config";
import { DataFileError, errorMessage } from "./errors";
import { RoomSchema, UserSchema } from "./types";
import type { Room, User } from "./types";

export const USERS_FILE = "users.json";
export const ROOMS_FILE = "rooms.json";

type Entity = { id: number };

function uniqueBy<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, keys: (keyof T & string)[]) {
  return z.array(schema).superRefine((rows, ctx) => {
    for (const key of keys) {
      const seen = new Set<unknown>();
      rows.forEach((row, index) => {
        if (seen.has(row[key])) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, key], message: `duplicate ${key} ${String(row[key])}` });
        }
        seen.add(row[key]);
      });
    }
  });
}

const UsersFileSchema = uniqueBy(UserSchema, ["id", "username"]);
const RoomsFileSchema = uniqueBy(RoomSchema, ["id"]);

/**
 * One JSON array file held in memory. Every save rewrites the whole file.
 */
export class JsonStore<T extends Entity> {
  private items: T[] = [];

  constructor(readonly filePath: string, private readonly schema: z.ZodType<T[], z.ZodTypeDef, unknown>) {}

  /** Loads the file, or seeds and writes it when missing. Returns true when seeded. */
  load(seed: () => T[]): boolean {
    if (!fs.existsSync(this.filePath)) {
      this.items = seed();
      this.save();
      return true;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      throw new DataFileError(this.filePath, errorMessage(err));
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
      throw new DataFileError(this.filePath, reason);
    }
    this.items = parsed.data;
    return false;
  }

  save(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.items, null, 2), "utf8");
  }

  list(): readonly T[] {
    return this.items;
  }

  get(id: number): T | undefined {
    return this.items.find((item) => item.id === id);
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  nextId(): number {
    return this.items.reduce((max, item) => Math.max(max, item.id), 0) + 1;
  }

  insert(item: T): T {
    this.items.push(item);
    return item;
  }

  remove(id: number): T | undefined {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) return undefined;
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  snapshot(): T[] {
    return structuredClone(this.items);
  }

  restore(items: T[]): void {
    this.items = items;
  }
}

/**
 * Owns the user and room stores.
 *
 * - Mutations go through transaction(): both files are written after the change.
 * - A throw inside the transaction restores the previous in-memory state; a failed
 *   write also rewrites the files from that state.
 */
export class Database {
  readonly users: JsonStore<User>;
  readonly rooms: JsonStore<Room>;

  constructor(private readonly config: Pick<AppConfig, "dataDir" | "defaultAdmin">) {
    this.users = new JsonStore<User>(path.join(config.dataDir, USERS_FILE), UsersFileSchema);
    this.rooms = new JsonStore<Room>(path.join(config.dataDir, ROOMS_FILE), RoomsFileSchema);
  }

  load(): { seededUsers: boolean; seededRooms: boolean } {
    const seededUsers = this.users.load(() => [
      { id: 1, username: this.config.defaultAdmin.username, password: this.config.defaultAdmin.password, role: "admin" },
    ]);
    const seededRooms = this.rooms.load(() => []);
    return { seededUsers, seededRooms };
  }

  transaction<R>(fn: () => R): R {
    const users = this.users.snapshot();
    const rooms = this.rooms.snapshot();
    let writing = false;
    try {
      const result = fn();
      writing = true;
      this.users.save();
      this.rooms.save();
      return result;
    } catch (err) {
      this.users.restore(users);
      this.rooms.restore(rooms);
      if (!writing) throw err;
      try {
        this.users.save();
        this.rooms.save();
      } catch (rollbackErr) {
        console.error("Rollback could not rewrite data files:", errorMessage(rollbackErr));
      }
      throw err;
    }
  }
}
