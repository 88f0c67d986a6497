// src/services/roomService.ts
import type { Database } from "../db";
import { NotFoundError, ValidationError } from "../errors";
import type { Room } from "../types";
import { roundMoney } from "../utils/input";

export type RoomPatch = { type?: string; price?: number; total?: number };

/** List rooms */
export function listRooms(db: Database): readonly Room[] {
  return db.rooms.list();
}

export function getRoom(db: Database, id: number): Room | null {
  return db.rooms.get(id) ?? null;
}

function checkPrice(price: number) {
  if (!Number.isFinite(price) || price < 0) throw new ValidationError("Price must be a non-negative number");
  return roundMoney(price);
}

function checkTotal(total: number) {
  if (!Number.isInteger(total) || total < 0) throw new ValidationError("Room count must be a non-negative integer");
  return total;
}

export function createRoom(db: Database, payload: { type: string; price: number; total: number }): Room {
  if (!payload.type) throw new ValidationError("Room type is required");
  const price = checkPrice(payload.price);
  const total = checkTotal(payload.total);

  return db.transaction(() =>
    db.rooms.insert({ id: db.rooms.nextId(), type: payload.type, price, total, available: total })
  );
}

/**
 * Changing `total` shifts `available` by the same amount, floored at 0,
 * so rooms already booked stay booked.
 */
export function adjustAvailability(room: Pick<Room, "total" | "available">, newTotal: number): number {
  return Math.max(0, room.available + (newTotal - room.total));
}

export function updateRoom(db: Database, id: number, patch: RoomPatch): Room {
  const room = db.rooms.get(id);
  if (!room) throw new NotFoundError("Room");

  if (patch.type !== undefined && !patch.type) throw new ValidationError("Room type is required");
  const price = patch.price === undefined ? undefined : checkPrice(patch.price);
  const total = patch.total === undefined ? undefined : checkTotal(patch.total);

  return db.transaction(() => {
    if (patch.type !== undefined) room.type = patch.type;
    if (price !== undefined) room.price = price;
    if (total !== undefined) {
      room.available = adjustAvailability(room, total);
      room.total = total;
    }
    return room;
  });
}

/** Delete a room by id. Throws NotFoundError if there is no such room */
export function deleteRoom(db: Database, id: number): Room {
  if (!db.rooms.get(id)) throw new NotFoundError("Room");
  return db.transaction(() => {
    const removed = db.rooms.remove(id);
    if (!removed) throw new NotFoundError("Room");
    return removed;
  });
}
