// src/types.ts
import { z } from "zod";
import { DEFAULT_STARTING_BALANCE } from "./config";
import { isWholeCents, roundMoney } from "./utils/input";

export const CUSTOMER_TYPES = ["member", "regular"] as const;
export type CustomerType = (typeof CUSTOMER_TYPES)[number];

// Float noise such as 700.0300000000001 is snapped to the cent; a real fraction of a cent is rejected.
function money() {
  return z
    .number()
    .finite()
    .refine(isWholeCents, { message: "must be a whole number of cents" })
    .transform(roundMoney);
}

const baseUser = {
  id: z.number().int().positive(),
  username: z.string(),
  password: z.string(),
};

// Older data files store customer_type "" and balance 0 on admins; unknown keys are stripped.
const AdminUserSchema = z.object({
  ...baseUser,
  role: z.literal("admin"),
});

const CustomerUserSchema = z.object({
  ...baseUser,
  role: z.literal("customer"),
  customer_type: z.enum(CUSTOMER_TYPES),
  balance: money().default(DEFAULT_STARTING_BALANCE),
});

export const UserSchema = z.discriminatedUnion("role", [AdminUserSchema, CustomerUserSchema]);

export const RoomSchema = z
  .object({
    id: z.number().int().positive(),
    type: z.string(),
    price: z.number().nonnegative().pipe(money()),
    total: z.number().int().nonnegative(),
    available: z.number().int().nonnegative(),
  })
  .refine((room) => room.available <= room.total, {
    message: "available must not exceed total",
    path: ["available"],
  });

export type User = z.infer<typeof UserSchema>;
export type Room = z.infer<typeof RoomSchema>;

export type BookingReceipt = {
  userId: number;
  roomId: number;
  roomType: string;
  quantity: number;
  unitPrice: number;
  totalCost: number;
  balance: number;
  available: number;
};
