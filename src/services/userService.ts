// src/services/userService.ts
import type { Database } from "../db";
import { ConflictError, ForbiddenError, NotFoundError, UnauthorizedError, ValidationError } from "../errors";
import { DEFAULT_STARTING_BALANCE } from "../config";
import type { CustomerType, User } from "../types";
import { roundMoney } from "../utils/input";

export type NewUser =
  | { username: string; password: string; role: "admin" }
  | { username: string; password: string; role: "customer"; customerType: CustomerType; balance?: number };

export type UserPatch = {
  username?: string;
  password?: string;
  customerType?: CustomerType;
  balance?: number;
};

export function listUsers(db: Database): readonly User[] {
  return db.users.list();
}

export function getUser(db: Database, id: number): User | null {
  return db.users.get(id) ?? null;
}

export function findByUsername(db: Database, username: string): User | null {
  return db.users.find((u) => u.username === username) ?? null;
}

export function authenticate(db: Database, username: string, password: string): User {
  const user = db.users.find((u) => u.username === username && u.password === password);
  if (!user) throw new UnauthorizedError();
  return user;
}

/** Throws when another account already uses this username. */
export function assertUsernameAvailable(db: Database, username: string, exceptId?: number) {
  if (!username) throw new ValidationError("Username is required");
  const existing = findByUsername(db, username);
  if (existing && existing.id !== exceptId) throw new ConflictError("Username already exists");
}

function checkBalance(balance: number) {
  if (!Number.isFinite(balance) || balance < 0) throw new ValidationError("Balance must be a non-negative number");
  return roundMoney(balance);
}

export function createUser(db: Database, payload: NewUser): User {
  assertUsernameAvailable(db, payload.username);
  if (!payload.password) throw new ValidationError("Password is required");

  const user: User =
    payload.role === "admin"
      ? { id: db.users.nextId(), username: payload.username, password: payload.password, role: "admin" }
      : {
          id: db.users.nextId(),
          username: payload.username,
          password: payload.password,
          role: "customer",
          customer_type: payload.customerType,
          balance: checkBalance(payload.balance ?? DEFAULT_STARTING_BALANCE),
        };

  return db.transaction(() => db.users.insert(user));
}

/** Partial update: fields left undefined keep their value. Everything is validated before anything changes. */
export function updateUser(db: Database, id: number, patch: UserPatch): User {
  const user = db.users.get(id);
  if (!user) throw new NotFoundError("User");

  if (patch.username !== undefined) assertUsernameAvailable(db, patch.username, id);
  if (patch.password !== undefined && !patch.password) throw new ValidationError("Password is required");
  if (user.role !== "customer" && (patch.customerType !== undefined || patch.balance !== undefined)) {
    throw new ValidationError("Only customer accounts have a customer type and balance");
  }
  const balance = patch.balance === undefined ? undefined : checkBalance(patch.balance);

  return db.transaction(() => {
    if (patch.username !== undefined) user.username = patch.username;
    if (patch.password !== undefined) user.password = patch.password;
    if (user.role === "customer") {
      if (patch.customerType !== undefined) user.customer_type = patch.customerType;
      if (balance !== undefined) user.balance = balance;
    }
    return user;
  });
}

/** Throws unless `id` exists and is not the account of `actingUserId`. */
export function assertDeletable(db: Database, id: number, actingUserId?: number) {
  if (!db.users.get(id)) throw new NotFoundError("User");
  if (id === actingUserId) throw new ForbiddenError("You cannot delete the account you are logged in with");
}

/** Delete a user by id. `actingUserId` is the logged-in administrator, who cannot delete themselves. */
export function deleteUser(db: Database, id: number, actingUserId?: number): User {
  assertDeletable(db, id, actingUserId);

  return db.transaction(() => {
    const removed = db.users.remove(id);
    if (!removed) throw new NotFoundError("User");
    return removed;
  });
}
