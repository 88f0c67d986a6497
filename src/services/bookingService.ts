// src/services/bookingService.ts
import type { Database } from "../db";
import { ForbiddenError, InsufficientFundsError, NotFoundError, ConflictError, ValidationError } from "../errors";
import type { BookingReceipt } from "../types";
import { roundMoney } from "../utils/input";

/**
 * Booking service
 *
 * - Preconditions are all checked before anything changes: room exists,
 *   quantity <= available, balance >= price * quantity.
 * - The debit and the inventory decrement run in one transaction, so both
 *   files are written or neither change sticks.
 */
export function createBooking(
  db: Database,
  params: { userId: number; roomId: number; quantity: number }
): BookingReceipt {
  if (!Number.isInteger(params.quantity) || params.quantity <= 0) {
    throw new ValidationError("Quantity must be a positive integer");
  }

  const customer = db.users.get(params.userId);
  if (!customer) throw new NotFoundError("User");
  if (customer.role !== "customer") throw new ForbiddenError("Only customers can book rooms");

  const room = db.rooms.get(params.roomId);
  if (!room) throw new NotFoundError("Room");
  if (params.quantity > room.available) {
    throw new ConflictError(`Requested quantity exceeds available rooms (${room.available} left)`);
  }

  const totalCost = roundMoney(room.price * params.quantity);
  if (customer.balance < totalCost) throw new InsufficientFundsError();

  return db.transaction(() => {
    customer.balance = roundMoney(customer.balance - totalCost);
    room.available -= params.quantity;
    return {
      userId: customer.id,
      roomId: room.id,
      roomType: room.type,
      quantity: params.quantity,
      unitPrice: room.price,
      totalCost,
      balance: customer.balance,
      available: room.available,
    };
  });
}
