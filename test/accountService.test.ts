import { describe, expect, it } from "vitest";
import { AuthorizationFailure, ConflictError, ValidationFailure } from "../src/utils/errors";
import { addSnack, createWorld, owner, OWNER_EMAIL, OWNER_PASSWORD } from "./support/fixtures";

const asha = {
  name: "Asha Patil",
  email: "Asha@Example.com",
  mobile: "9000000001",
  password: "secret1",
};

describe("AccountService.register", () => {
  it("stores a hashed password and returns the profile without it", async () => {
    const { store, services } = createWorld();

    const profile = await services.accounts.register(asha);

    expect(profile).toEqual({
      id: profile.id,
      name: "Asha Patil",
      email: "asha@example.com",
      mobile: "9000000001",
      createdAt: profile.createdAt,
    });
    const [stored] = store.data.customers;
    expect(stored.passwordHash).not.toBe("secret1");
    expect(stored.passwordHash.startsWith("$2")).toBe(true);
  });

  it.each([
    [{ ...asha, name: "A" }, "Name must contain only letters and spaces (2-100 characters)."],
    [{ ...asha, name: "Asha 2" }, "Name must contain only letters and spaces (2-100 characters)."],
    [{ ...asha, mobile: "90000" }, "Mobile number must be exactly 10 digits."],
    [{ ...asha, email: "asha" }, "Please enter a valid email address."],
    [{ ...asha, password: "12345" }, "Password must be at least 6 characters."],
    [{ ...asha, confirmPassword: "other" }, "Passwords do not match."],
  ])("rejects invalid input %#", async (input, message) => {
    const { services } = createWorld();

    await expect(services.accounts.register(input)).rejects.toThrow(
      new ValidationFailure(message)
    );
  });

  it("names the field that is already registered", async () => {
    const { services } = createWorld();
    await services.accounts.register(asha);

    await expect(
      services.accounts.register({ ...asha, mobile: "9000000002" })
    ).rejects.toThrow(new ConflictError("This email is already registered."));
    await expect(
      services.accounts.register({ ...asha, email: "other@example.com" })
    ).rejects.toThrow(new ConflictError("This mobile number is already registered."));
  });

  it("keeps the owner's email for the owner", async () => {
    const { services } = createWorld();

    await expect(
      services.accounts.register({ ...asha, email: OWNER_EMAIL })
    ).rejects.toBeInstanceOf(ConflictError);
  });
});

describe("AccountService.login", () => {
  it("accepts the email or the mobile number", async () => {
    const { services } = createWorld();
    const profile = await services.accounts.register(asha);
    const expected = { role: "customer", customerId: profile.id, name: "Asha Patil" };

    expect(await services.accounts.login("ASHA@example.com", "secret1")).toEqual(expected);
    expect(await services.accounts.login("9000000001", "secret1")).toEqual(expected);
  });

  it("rejects a wrong password or an unknown login", async () => {
    const { services } = createWorld();
    await services.accounts.register(asha);

    await expect(services.accounts.login("9000000001", "wrong")).rejects.toMatchObject({
      statusCode: 401,
      message: "Invalid email/mobile or password.",
    });
    await expect(services.accounts.login("nobody@example.com", "secret1")).rejects.toBeInstanceOf(
      AuthorizationFailure
    );
    await expect(services.accounts.login("", "secret1")).rejects.toBeInstanceOf(
      ValidationFailure
    );
  });

  it("signs the owner in from the same form", async () => {
    const { services } = createWorld();

    expect(await services.accounts.login(OWNER_EMAIL.toUpperCase(), OWNER_PASSWORD)).toEqual(owner);
    await expect(services.accounts.login(OWNER_EMAIL, "wrong")).rejects.toBeInstanceOf(
      AuthorizationFailure
    );
  });
});

describe("AccountService.deleteAccount", () => {
  it("removes the customer's carts and feedback but keeps orders and payments", async () => {
    const { store, services } = createWorld();
    const profile = await services.accounts.register(asha);
    const customer = await services.accounts.login(asha.email, asha.password);
    if (customer.role !== "customer") {
      throw new Error("expected a customer");
    }
    const samosa = await addSnack(store, "Samosa", 20, 10);
    await services.carts.addItem(customer, samosa.id, 2);
    const placed = await services.checkout.confirmOrder(customer, "cash");
    await services.carts.addItem(customer, samosa.id, 1);
    await services.feedback.submitFeedback(customer, { rating: 5, content: "Tasty" });

    await services.accounts.deleteAccount(customer);

    expect(store.data.customers).toHaveLength(0);
    expect(store.data.carts).toHaveLength(0);
    expect(store.data.cartItems).toHaveLength(0);
    expect(store.data.feedback).toHaveLength(0);
    expect(store.data.orders.map((o) => [o.id, o.customerId])).toEqual([
      [placed.ok ? placed.order.id : "", null],
    ]);
    expect(store.data.orderItems).toHaveLength(1);
    expect(store.data.payments).toHaveLength(1);
    expect(await services.accounts.resolveCustomer(profile.id)).toBeNull();
  });

  it("does not delete the owner", async () => {
    const { services } = createWorld();

    await expect(services.accounts.deleteAccount(owner)).rejects.toMatchObject({
      statusCode: 403,
      message: "Owner account cannot be deleted from here.",
    });
    await expect(services.accounts.deleteAccount(undefined)).rejects.toMatchObject({
      statusCode: 401,
    });
  });
});

describe("AccountService.describe", () => {
  it("describes customers and the owner", async () => {
    const { services } = createWorld();
    const profile = await services.accounts.register(asha);

    expect(
      await services.accounts.describe({ role: "customer", customerId: profile.id, name: "Asha Patil" })
    ).toEqual({ role: "customer", customer: profile });
    expect(await services.accounts.describe(owner)).toEqual({ role: "owner", email: OWNER_EMAIL });
  });
});
