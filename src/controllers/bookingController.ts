// src/controllers/bookingController.ts
import type { AppContext } from "../context";
import { ServiceError } from "../errors";
import * as BookingService from "../services/bookingService";
import * as RoomService from "../services/roomService";
import * as UserService from "../services/userService";
import { formatMoney, parseInteger } from "../utils/input";
import { listRooms } from "./roomController";

export async function bookRoom(ctx: AppContext, customerId: number) {
  const { io } = ctx;
  if (RoomService.listRooms(ctx.db).length === 0) return io.print("No rooms available to book.");
  await listRooms(ctx);

  const roomId = parseInteger(await io.ask("Room ID to book: "));
  if (roomId === null) return io.print("Invalid room ID.");
  const room = RoomService.getRoom(ctx.db, roomId);
  if (!room) return io.print("Room not found");

  io.print(`Selected room: ${room.type}, price: ${formatMoney(room.price)}, available: ${room.available}`);
  const quantity = parseInteger(await io.ask("Quantity: "));
  if (quantity === null || quantity <= 0) return io.print("Invalid quantity.");

  try {
    const receipt = BookingService.createBooking(ctx.db, { userId: customerId, roomId, quantity });
    io.print(`Booking confirmed! Charged ${formatMoney(receipt.totalCost)}, remaining balance: ${formatMoney(receipt.balance)}`);
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}

export async function showBalance(ctx: AppContext, customerId: number) {
  const user = UserService.getUser(ctx.db, customerId);
  if (!user || user.role !== "customer") return ctx.io.print("Customer account not found");
  ctx.io.print(`Current balance: ${formatMoney(user.balance)}`);
}
