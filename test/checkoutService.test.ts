import { describe, expect, it } from "vitest";
import {
  parsePaymentMethod,
  toCheckoutError,
  type CheckoutFailure,
} from "../src/services/checkoutService";
import { StockFailure, ValidationFailure } from "../src/utils/errors";
import { addCustomer, addSnack, createWorld, manualClock } from "./support/fixtures";

const NOON_IST = "2025-03-14T06:30:00.000Z";

const samosaAndCoffee = async (samosaStock: number, env: Record<string, string> = {}) => {
  const { clock } = manualClock(NOON_IST);
  const world = createWorld({ env, clock });
  const customer = await addCustomer(world.store);
  const samosa = await addSnack(world.store, "Samosa", 20, samosaStock);
  const coffee = await addSnack(world.store, "Coffee", 10, 0);
  await world.services.carts.addItem(customer, samosa.id, 3);
  await world.services.carts.addItem(customer, coffee.id, 2);
  return { ...world, customer, samosa, coffee };
};

describe("parsePaymentMethod", () => {
  it("accepts cash and cashless in any case", () => {
    expect(parsePaymentMethod(" CASH ")).toBe("cash");
    expect(parsePaymentMethod("Cashless")).toBe("cashless");
  });

  it("rejects anything else", () => {
    expect(() => parsePaymentMethod("card")).toThrow(ValidationFailure);
    expect(() => parsePaymentMethod(undefined)).toThrow(ValidationFailure);
  });
});

describe("CheckoutService.computeCheckoutSummary", () => {
  it("prices lines from the catalog", async () => {
    const { services, customer } = await samosaAndCoffee(5);

    const summary = await services.checkout.computeCheckoutSummary(customer);

    expect(summary.total).toBe(80);
    expect(summary.missingItemIds).toEqual([]);
    expect(
      summary.lineItems.map((line) => [line.snackName, line.quantity, line.subtotal, line.available])
    ).toEqual([
      ["Samosa", 3, 60, 5],
      ["Coffee", 2, 20, null],
    ]);
  });
});

describe("CheckoutService.confirmOrder", () => {
  it("places a cash order, takes stock and empties the cart", async () => {
    const { store, services, customer, samosa, coffee } = await samosaAndCoffee(5);
    const cartBefore = await services.carts.getOrCreateCart(customer);

    const result = await services.checkout.confirmOrder(customer, "cash");

    if (!result.ok) {
      throw new Error(`checkout failed: ${JSON.stringify(result.failures)}`);
    }
    expect(result.order.price).toBe(80);
    expect(result.order.status).toBe("Pending");
    expect(result.order.customerId).toBe(customer.customerId);
    expect(result.order.orderTime.toISOString()).toBe(NOON_IST);
    expect(result.items.map((item) => [item.snackName, item.quantity])).toEqual([
      ["Samosa", 3],
      ["Coffee", 2],
    ]);
    expect(result.payment.mode).toBe("Cash");
    expect(result.payment.status).toBe("Pending");
    expect(result.payment.orderId).toBe(result.order.id);

    expect((await store.findSnackById(samosa.id))?.stock).toBe(2);
    expect((await store.findSnackById(coffee.id))?.stock).toBe(0);
    expect(store.data.cartItems).toHaveLength(0);

    const cartAfter = await services.carts.getOrCreateCart(customer);
    expect(cartAfter.id).toBe(cartBefore.id);
    expect(await services.carts.cartItemCount(customer)).toBe(0);
  });

  it("marks cashless orders paid with a pending payment", async () => {
    const { services, customer } = await samosaAndCoffee(5);

    const result = await services.checkout.confirmOrder(customer, "cashless");

    expect(result.ok && [result.order.status, result.payment.mode, result.payment.status]).toEqual([
      "Paid",
      "Cashless",
      "Pending",
    ]);
  });

  it("refuses the whole order when one line is short and changes nothing", async () => {
    const { store, services, customer, samosa } = await samosaAndCoffee(2);

    const result = await services.checkout.confirmOrder(customer, "cash");

    expect(result).toEqual({
      ok: false,
      failures: [
        {
          kind: "insufficient_stock",
          message: "Only 2 left for Samosa.",
          cartItemId: store.data.cartItems[0].id,
          snackId: samosa.id,
          snackName: "Samosa",
          available: 2,
          requested: 3,
        },
      ],
    });
    expect(store.data.orders).toHaveLength(0);
    expect(store.data.orderItems).toHaveLength(0);
    expect(store.data.payments).toHaveLength(0);
    expect((await store.findSnackById(samosa.id))?.stock).toBe(2);
    expect(store.data.cartItems.map((item) => item.quantity)).toEqual([3, 2]);
  });

  it("reports an empty cart", async () => {
    const world = createWorld();
    const customer = await addCustomer(world.store);

    const result = await world.services.checkout.confirmOrder(customer, "cash");

    expect(result).toEqual({
      ok: false,
      failures: [{ kind: "empty_cart", message: "Your cart is empty." }],
    });
  });

  it("reports lines whose snack was deleted", async () => {
    const { store, services, customer, coffee } = await samosaAndCoffee(5);
    const coffeeLine = store.data.cartItems[1];
    await store.deleteSnack(coffee.id);

    const result = await services.checkout.confirmOrder(customer, "cash");

    expect(result).toEqual({
      ok: false,
      failures: [
        {
          kind: "missing_snack",
          cartItemId: coffeeLine.id,
          snackId: coffee.id,
          message: `Item ${coffeeLine.id} not found.`,
        },
      ],
    });
    expect(store.data.orders).toHaveLength(0);
    expect(store.data.cartItems).toHaveLength(2);
  });

  it("treats stock 0 as sold out when the legacy switch is off", async () => {
    const { services, customer } = await samosaAndCoffee(5, { ZERO_STOCK_UNLIMITED: "false" });

    const result = await services.checkout.confirmOrder(customer, "cash");

    expect(!result.ok && result.failures.map((f) => f.message)).toEqual([
      "Only 0 left for Coffee.",
    ]);
  });

  it("ignores stock on snacks that are not tracked", async () => {
    const world = createWorld();
    const customer = await addCustomer(world.store);
    const chaha = await addSnack(world.store, "Chaha", 10, 1, false);
    await world.services.carts.addItem(customer, chaha.id, 4);

    const result = await world.services.checkout.confirmOrder(customer, "cash");

    expect(result.ok).toBe(true);
    expect((await world.store.findSnackById(chaha.id))?.stock).toBe(1);
  });

  it("rolls everything back when a write fails half way", async () => {
    const { store, services, customer, samosa } = await samosaAndCoffee(5);
    store.on("createPayment", () => {
      throw new Error("write conflict");
    });

    await expect(services.checkout.confirmOrder(customer, "cash")).rejects.toThrow(
      "write conflict"
    );

    expect(store.data.orders).toHaveLength(0);
    expect(store.data.orderItems).toHaveLength(0);
    expect(store.data.payments).toHaveLength(0);
    expect((await store.findSnackById(samosa.id))?.stock).toBe(5);
    expect(store.data.cartItems.map((item) => item.quantity)).toEqual([3, 2]);
  });

  it("turns a lost stock race into a stock failure", async () => {
    const { store, services, customer, samosa } = await samosaAndCoffee(5);
    const samosaLine = store.data.cartItems[0];
    // Someone else buys 4 Samosas between the check and the decrement
    store.on("decrementStock", (data) => {
      const snack = data.snacks.find((s) => s.id === samosa.id);
      if (snack) {
        snack.stock = 1;
      }
    });

    const result = await services.checkout.confirmOrder(customer, "cash");

    expect(result).toEqual({
      ok: false,
      failures: [
        {
          kind: "insufficient_stock",
          message: "Only 1 left for Samosa.",
          cartItemId: samosaLine.id,
          snackId: samosa.id,
          snackName: "Samosa",
          available: 1,
          requested: 3,
        },
      ],
    });
    expect(store.data.orders).toHaveLength(0);
    expect(store.data.payments).toHaveLength(0);
  });

  it("never sells more than the stock to concurrent checkouts", async () => {
    const world = createWorld();
    const samosa = await addSnack(world.store, "Samosa", 20, 3);
    const asha = await addCustomer(world.store, "Asha Patil", "9000000001");
    const ravi = await addCustomer(world.store, "Ravi Kulkarni", "9000000002");
    await world.services.carts.addItem(asha, samosa.id, 2);
    await world.services.carts.addItem(ravi, samosa.id, 2);

    const results = await Promise.all([
      world.services.checkout.confirmOrder(asha, "cash"),
      world.services.checkout.confirmOrder(ravi, "cash"),
    ]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(world.store.data.orders).toHaveLength(1);
    expect((await world.store.findSnackById(samosa.id))?.stock).toBe(1);
  });
});

describe("toCheckoutError", () => {
  it("maps an empty cart to CART_EMPTY", () => {
    const error = toCheckoutError([{ kind: "empty_cart", message: "Your cart is empty." }]);
    expect([error.statusCode, error.code, error.message]).toEqual([
      400,
      "CART_EMPTY",
      "Your cart is empty.",
    ]);
  });

  it("maps missing snacks to an integrity failure listing every failure", () => {
    const failures: CheckoutFailure[] = [
      { kind: "missing_snack", cartItemId: "c1", snackId: "s1", message: "Item c1 not found." },
    ];
    const error = toCheckoutError(failures);
    expect([error.statusCode, error.code, error.details]).toEqual([
      409,
      "INTEGRITY_FAILURE",
      { failures },
    ]);
  });

  it("maps shortages to a stock failure", () => {
    const error = toCheckoutError([
      {
        kind: "insufficient_stock",
        message: "Only 2 left for Samosa.",
        cartItemId: "c1",
        snackId: "s1",
        snackName: "Samosa",
        available: 2,
        requested: 3,
      },
    ]);
    expect(error).toBeInstanceOf(StockFailure);
    expect([error.statusCode, error.code, error.message]).toEqual([
      409,
      "INSUFFICIENT_STOCK",
      "Only 2 left for Samosa.",
    ]);
    expect(error.details).toEqual({
      shortages: [
        { cartItemId: "c1", snackId: "s1", snackName: "Samosa", available: 2, requested: 3 },
      ],
    });
  });
});
