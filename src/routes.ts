// src/routes.ts
import type { AppContext } from "./context";
import { runMenu } from "./menu";
import type { Menu } from "./menu";
import * as AuthCtrl from "./controllers/authController";
import * as UserCtrl from "./controllers/userController";
import * as RoomCtrl from "./controllers/roomController";
import * as BookingCtrl from "./controllers/bookingController";

// Users
export function userManagementMenu(adminId: number): Menu {
  return {
    title: "User management",
    entries: [
      { label: "List users", handler: UserCtrl.listUsers },
      { label: "Add user", handler: UserCtrl.createUser },
      { label: "Update user", handler: UserCtrl.updateUser },
      { label: "Delete user", handler: (ctx) => UserCtrl.deleteUser(ctx, adminId) },
      { label: "Back", leave: true },
    ],
  };
}

// Rooms
export const roomManagementMenu: Menu = {
  title: "Room management",
  entries: [
    { label: "List rooms", handler: RoomCtrl.listRooms },
    { label: "Add room", handler: RoomCtrl.createRoom },
    { label: "Update room", handler: RoomCtrl.updateRoom },
    { label: "Delete room", handler: RoomCtrl.deleteRoom },
    { label: "Back", leave: true },
  ],
};

export function adminMenu(adminId: number): Menu {
  return {
    title: "Administrator menu",
    entries: [
      { label: "User management", handler: (ctx) => runMenu(ctx, userManagementMenu(adminId)) },
      { label: "Room management", handler: (ctx) => runMenu(ctx, roomManagementMenu) },
      { label: "Log out", leave: true, farewell: "Logged out." },
    ],
  };
}

// Bookings
export function customerMenu(customerId: number): Menu {
  return {
    title: "Customer menu",
    entries: [
      { label: "View rooms", handler: RoomCtrl.listRooms },
      { label: "Book a room", handler: (ctx) => BookingCtrl.bookRoom(ctx, customerId) },
      { label: "View balance", handler: (ctx) => BookingCtrl.showBalance(ctx, customerId) },
      { label: "Log out", leave: true, farewell: "Logged out." },
    ],
  };
}

async function loginAndRoute(ctx: AppContext) {
  const user = await AuthCtrl.login(ctx);
  if (!user) return;
  await runMenu(ctx, user.role === "admin" ? adminMenu(user.id) : customerMenu(user.id));
}

export const mainMenu: Menu = {
  title: "Welcome to the hotel management system",
  entries: [
    { label: "Log in", handler: loginAndRoute },
    { label: "Register (customers only)", handler: AuthCtrl.register },
    { label: "Exit", leave: true, farewell: "Goodbye." },
  ],
};
