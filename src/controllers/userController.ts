// src/controllers/userController.ts
import type { AppContext } from "../context";
import { ServiceError } from "../errors";
import * as UserService from "../services/userService";
import type { NewUser, UserPatch } from "../services/userService";
import type { User } from "../types";
import { formatMoney, isConfirmation, parseAmount, parseInteger } from "../utils/input";
import { customerTypeFromChoice } from "./authController";

export function formatUser(user: User): string {
  const line = `ID: ${user.id}, Username: ${user.username}, Role: ${user.role}`;
  if (user.role !== "customer") return line;
  return `${line}, Type: ${user.customer_type}, Balance: ${formatMoney(user.balance)}`;
}

export async function listUsers(ctx: AppContext) {
  ctx.io.print("----- Users -----");
  for (const user of UserService.listUsers(ctx.db)) ctx.io.print(formatUser(user));
}

export async function createUser(ctx: AppContext) {
  const { io } = ctx;
  io.print("----- Add user -----");
  try {
    const username = await io.ask("Username: ");
    UserService.assertUsernameAvailable(ctx.db, username);
    const password = await io.ask("Password: ");

    let payload: NewUser;
    const roleChoice = await io.ask("Role (1. admin 2. customer): ");
    if (roleChoice === "1") {
      payload = { username, password, role: "admin" };
    } else if (roleChoice === "2") {
      const customerType = customerTypeFromChoice(await io.ask("Customer type (1. member 2. regular): "));
      payload = { username, password, role: "customer", customerType, balance: ctx.config.startingBalance };
    } else {
      return io.print("Invalid role option.");
    }

    const user = UserService.createUser(ctx.db, payload);
    io.print(`User added with ID ${user.id}.`);
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}

export async function updateUser(ctx: AppContext) {
  const { io } = ctx;
  const id = parseInteger(await io.ask("User ID to update: "));
  if (id === null) return io.print("Invalid ID.");
  const user = UserService.getUser(ctx.db, id);
  if (!user) return io.print("User not found");

  const patch: UserPatch = {};
  io.print(`Current username: ${user.username}`);
  const username = await io.ask("New username (leave blank to keep): ");
  if (username) patch.username = username;
  const password = await io.ask("New password (leave blank to keep): ");
  if (password) patch.password = password;

  if (user.role === "customer") {
    io.print(`Current customer type: ${user.customer_type}`);
    const typeChoice = await io.ask("New customer type (1. member 2. regular, leave blank to keep): ");
    if (typeChoice === "1" || typeChoice === "2") patch.customerType = customerTypeFromChoice(typeChoice);

    io.print(`Current balance: ${formatMoney(user.balance)}`);
    const balanceInput = await io.ask("New balance (leave blank to keep): ");
    if (balanceInput) {
      const balance = parseAmount(balanceInput);
      if (balance === null) return io.print("Invalid balance.");
      patch.balance = balance;
    }
  }

  try {
    UserService.updateUser(ctx.db, id, patch);
    io.print("User updated.");
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}

export async function deleteUser(ctx: AppContext, adminId: number) {
  const { io } = ctx;
  const id = parseInteger(await io.ask("User ID to delete: "));
  if (id === null) return io.print("Invalid ID.");
  try {
    UserService.assertDeletable(ctx.db, id, adminId);
    if (!isConfirmation(await io.ask("Delete this user? (y/n): "))) return io.print("Deletion cancelled.");
    UserService.deleteUser(ctx.db, id, adminId);
    io.print("User deleted.");
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}
