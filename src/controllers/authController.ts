// src/controllers/authController.ts
import type { AppContext } from "../context";
import { ServiceError } from "../errors";
import * as UserService from "../services/userService";
import type { CustomerType, User } from "../types";
import { formatMoney } from "../utils/input";

/** "1" picks member; anything else is a regular account. */
export function customerTypeFromChoice(choice: string): CustomerType {
  return choice === "1" ? "member" : "regular";
}

export async function login(ctx: AppContext): Promise<User | null> {
  const { io } = ctx;
  const username = await io.ask("Username: ");
  const password = await io.ask("Password: ");
  try {
    const user = UserService.authenticate(ctx.db, username, password);
    io.print("Login successful!");
    return user;
  } catch (err) {
    if (err instanceof ServiceError) {
      io.print(err.message);
      return null;
    }
    throw err;
  }
}

export async function register(ctx: AppContext) {
  const { io } = ctx;
  io.print("Register a new customer account");
  try {
    const username = await io.ask("Username: ");
    UserService.assertUsernameAvailable(ctx.db, username);
    const password = await io.ask("Password: ");
    const customerType = customerTypeFromChoice(await io.ask("Customer type (1. member 2. regular): "));

    const user = UserService.createUser(ctx.db, {
      username,
      password,
      role: "customer",
      customerType,
      balance: ctx.config.startingBalance,
    });
    if (user.role === "customer") io.print(`Registration successful! Starting balance: ${formatMoney(user.balance)}`);
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}
