import { afterEach, describe, expect, it, vi } from "vitest";
import { EndOfInputError } from "../src/errors";
import { runMenu, selectEntry } from "../src/menu";
import { mainMenu } from "../src/routes";
import * as RoomService from "../src/services/roomService";
import * as UserService from "../src/services/userService";
import { makeContext, openTestDb } from "./helpers";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("menu sessions", () => {
  it("registers a customer who then books a room and checks the balance", async () => {
    const db = openTestDb();
    RoomService.createRoom(db, { type: "double", price: 200, total: 3 });
    const ctx = makeContext(["2", "alice", "pw", "1", "1", "alice", "pw", "2", "1", "2", "3", "4", "3"], db);

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Registration successful! Starting balance: 1000.00");
    expect(ctx.io.lines).toContain("Login successful!");
    expect(ctx.io.lines).toContain("ID: 1, Type: double, Price: 200.00, Total: 3, Available: 3");
    expect(ctx.io.lines).toContain("Selected room: double, price: 200.00, available: 3");
    expect(ctx.io.lines).toContain("Booking confirmed! Charged 400.00, remaining balance: 600.00");
    expect(ctx.io.lines).toContain("Current balance: 600.00");
    expect(ctx.io.lines.slice(-1)).toEqual(["Goodbye."]);
    expect(ctx.io.remaining).toBe(0);
    expect(RoomService.getRoom(db, 1)?.available).toBe(1);
    expect(UserService.findByUsername(db, "alice")).toMatchObject({ customer_type: "member", balance: 600 });
  });

  it("lets an administrator add, resize and delete a room", async () => {
    const ctx = makeContext([
      "1", "admin", "admin",
      "2",
      "2", "suite", "350", "2",
      "3", "1", "", "", "5",
      "1",
      "4", "1", "y",
      "5",
      "3",
      "3",
    ]);

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Room added with ID 1.");
    expect(ctx.io.lines).toContain("Current total: 2");
    expect(ctx.io.lines).toContain("Room updated.");
    expect(ctx.io.lines).toContain("ID: 1, Type: suite, Price: 350.00, Total: 5, Available: 5");
    expect(ctx.io.lines).toContain("Room deleted.");
    expect(ctx.io.lines).toContain("Logged out.");
    expect(ctx.io.remaining).toBe(0);
    expect(RoomService.listRooms(ctx.db)).toEqual([]);
  });

  it("reports bad choices, bad credentials and taken usernames", async () => {
    const ctx = makeContext(["9", "1", "admin", "nope", "2", "admin", "3"]);

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Invalid option, please try again.");
    expect(ctx.io.lines).toContain("Invalid username or password");
    expect(ctx.io.lines).toContain("Username already exists");
    expect(ctx.io.questions.filter((q) => q === "Password: ")).toHaveLength(1);
    expect(UserService.listUsers(ctx.db)).toHaveLength(1);
  });

  it("aborts a user update with an invalid balance and guards deletions", async () => {
    const db = openTestDb();
    UserService.createUser(db, { username: "bob", password: "pw", role: "customer", customerType: "regular" });
    const ctx = makeContext(
      [
        "1", "admin", "admin",
        "1",
        "3", "2", "robert", "", "", "lots",
        "4", "1",
        "4", "99",
        "4", "abc",
        "1",
        "5",
        "3",
        "3",
      ],
      db
    );

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Invalid balance.");
    expect(ctx.io.lines).toContain("You cannot delete the account you are logged in with");
    expect(ctx.io.questions).not.toContain("Delete this user? (y/n): ");
    expect(ctx.io.lines).toContain("User not found");
    expect(ctx.io.lines).toContain("Invalid ID.");
    expect(ctx.io.lines).toContain("ID: 1, Username: admin, Role: admin");
    expect(ctx.io.lines).toContain("ID: 2, Username: bob, Role: customer, Type: regular, Balance: 1000.00");
    expect(ctx.io.remaining).toBe(0);
  });

  it("refuses a price written as a hex literal", async () => {
    const ctx = makeContext(["1", "admin", "admin", "2", "2", "suite", "0x20", "5", "3", "3"]);

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Invalid price.");
    expect(ctx.io.questions).not.toContain("Total rooms: ");
    expect(RoomService.listRooms(ctx.db)).toEqual([]);
  });

  it("keeps running after an unexpected failure", async () => {
    const ctx = makeContext(["1", "admin", "admin", "2", "2", "suite", "350", "2", "5", "3", "3"]);
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(ctx.db.rooms, "save").mockImplementation(() => {
      throw new Error("disk full");
    });

    await runMenu(ctx, mainMenu);

    expect(ctx.io.lines).toContain("Operation failed: disk full");
    expect(logged).toHaveBeenCalled();
    expect(ctx.io.lines.slice(-1)).toEqual(["Goodbye."]);
    expect(RoomService.listRooms(ctx.db)).toEqual([]);
  });

  it("stops when input runs out", async () => {
    const ctx = makeContext([]);

    await expect(runMenu(ctx, mainMenu)).rejects.toBeInstanceOf(EndOfInputError);
  });
});

describe("selectEntry", () => {
  it("maps 1-based numbers to entries", () => {
    expect(selectEntry(mainMenu, "1")?.label).toBe("Log in");
    expect(selectEntry(mainMenu, "3")?.label).toBe("Exit");
  });

  it.each(["0", "4", "", "one", "-1", "1.5", "01", "+1"])("ignores %j", (choice) => {
    expect(selectEntry(mainMenu, choice)).toBeUndefined();
  });
});
