// src/controllers/roomController.ts
import type { AppContext } from "../context";
import { ServiceError } from "../errors";
import * as RoomService from "../services/roomService";
import type { RoomPatch } from "../services/roomService";
import type { Room } from "../types";
import { formatMoney, isConfirmation, parseAmount, parseInteger } from "../utils/input";

export function formatRoom(room: Room): string {
  return `ID: ${room.id}, Type: ${room.type}, Price: ${formatMoney(room.price)}, Total: ${room.total}, Available: ${room.available}`;
}

export async function listRooms(ctx: AppContext) {
  const rows = RoomService.listRooms(ctx.db);
  if (rows.length === 0) return ctx.io.print("No rooms on record.");
  ctx.io.print("----- Rooms -----");
  for (const room of rows) ctx.io.print(formatRoom(room));
}

export async function createRoom(ctx: AppContext) {
  const { io } = ctx;
  io.print("----- Add room -----");
  const type = await io.ask("Room type: ");
  const price = parseAmount(await io.ask("Price: "));
  if (price === null) return io.print("Invalid price.");
  const total = parseInteger(await io.ask("Total rooms: "));
  if (total === null) return io.print("Invalid room count.");

  try {
    const room = RoomService.createRoom(ctx.db, { type, price, total });
    io.print(`Room added with ID ${room.id}.`);
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}

export async function updateRoom(ctx: AppContext) {
  const { io } = ctx;
  const id = parseInteger(await io.ask("Room ID to update: "));
  if (id === null) return io.print("Invalid ID.");
  const room = RoomService.getRoom(ctx.db, id);
  if (!room) return io.print("Room not found");

  const patch: RoomPatch = {};
  io.print(`Current type: ${room.type}`);
  const type = await io.ask("New type (leave blank to keep): ");
  if (type) patch.type = type;

  io.print(`Current price: ${formatMoney(room.price)}`);
  const priceInput = await io.ask("New price (leave blank to keep): ");
  if (priceInput) {
    const price = parseAmount(priceInput);
    if (price === null) return io.print("Invalid price.");
    patch.price = price;
  }

  io.print(`Current total: ${room.total}`);
  const totalInput = await io.ask("New total (leave blank to keep): ");
  if (totalInput) {
    const total = parseInteger(totalInput);
    if (total === null) return io.print("Invalid room count.");
    patch.total = total;
  }

  try {
    RoomService.updateRoom(ctx.db, id, patch);
    io.print("Room updated.");
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}

export async function deleteRoom(ctx: AppContext) {
  const { io } = ctx;
  const id = parseInteger(await io.ask("Room ID to delete: "));
  if (id === null) return io.print("Invalid ID.");
  if (!RoomService.getRoom(ctx.db, id)) return io.print("Room not found");
  if (!isConfirmation(await io.ask("Delete this room? (y/n): "))) return io.print("Deletion cancelled.");

  try {
    RoomService.deleteRoom(ctx.db, id);
    io.print("Room deleted.");
  } catch (err) {
    if (err instanceof ServiceError) return io.print(err.message);
    throw err;
  }
}
