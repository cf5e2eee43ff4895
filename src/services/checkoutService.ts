import type { ShopStore } from "../store/shopStore";
import {
  PAYMENT_METHODS,
  type CartItemRecord,
  type Clock,
  type CustomerPrincipal,
  type OrderItemRecord,
  type OrderRecord,
  type PaymentMethod,
  type PaymentRecord,
  type SnackRecord,
} from "../types";
import {
  IntegrityFailure,
  StockFailure,
  ValidationFailure,
  type AppError,
  type StockShortage,
} from "../utils/errors";
import type { CartService } from "./cartService";
import { availableStock, type StockRules } from "./stock";

export interface CheckoutLine {
  cartItemId: string;
  snackId: string;
  snackName: string;
  price: number;
  quantity: number;
  subtotal: number;
  available: number | null;
}

export interface CheckoutSummary {
  cartId: string;
  lineItems: CheckoutLine[];
  total: number;
  /** Cart lines whose snack has been deleted from the catalog. */
  missingItemIds: string[];
}

export type CheckoutFailure =
  | { kind: "empty_cart"; message: string }
  | { kind: "missing_snack"; cartItemId: string; snackId: string; message: string }
  | ({ kind: "insufficient_stock"; message: string } & StockShortage);

export type CheckoutResult =
  | {
      ok: true;
      order: OrderRecord;
      items: OrderItemRecord[];
      payment: PaymentRecord;
    }
  | { ok: false; failures: CheckoutFailure[] };

interface PricedLine {
  item: CartItemRecord;
  snack: SnackRecord;
  limit: number | null;
}

export const parsePaymentMethod = (value: unknown): PaymentMethod => {
  const method = typeof value === "string" ? value.trim().toLowerCase() : "";
  const match = PAYMENT_METHODS.find((candidate) => candidate === method);
  if (!match) {
    throw new ValidationFailure(
      `Payment method must be one of: ${PAYMENT_METHODS.join(", ")}`
    );
  }
  return match;
};

const shortageFailure = (shortage: StockShortage): CheckoutFailure => ({
  kind: "insufficient_stock",
  message: `Only ${shortage.available} left for ${shortage.snackName}.`,
  ...shortage,
});

/** Maps a refused checkout onto the error the API answers with. */
export const toCheckoutError = (failures: CheckoutFailure[]): AppError => {
  const message = failures.map((failure) => failure.message).join(" ");
  if (failures.some((failure) => failure.kind === "empty_cart")) {
    return new ValidationFailure(message, "CART_EMPTY");
  }
  if (failures.some((failure) => failure.kind === "missing_snack")) {
    return new IntegrityFailure(message, { failures });
  }
  const shortages: StockShortage[] = [];
  for (const failure of failures) {
    if (failure.kind === "insufficient_stock") {
      const { kind: _kind, message: _message, ...shortage } = failure;
      shortages.push(shortage);
    }
  }
  return new StockFailure(shortages);
};

const bySnackId = (a: PricedLine, b: PricedLine): number =>
  a.snack.id < b.snack.id ? -1 : a.snack.id > b.snack.id ? 1 : 0;

export class CheckoutService {
  constructor(
    private readonly store: ShopStore,
    private readonly carts: CartService,
    private readonly stockRules: StockRules,
    private readonly clock: Clock
  ) {}

  async computeCheckoutSummary(customer: CustomerPrincipal): Promise<CheckoutSummary> {
    const cart = await this.carts.getOrCreateCart(customer);
    const items = await this.store.listCartItems([cart.id]);
    const snacks = await this.store.findSnacksByIds(items.map((item) => item.snackId));
    const snackById = new Map(snacks.map((snack) => [snack.id, snack]));

    const lineItems: CheckoutLine[] = [];
    const missingItemIds: string[] = [];
    let total = 0;

    for (const item of items) {
      const snack = snackById.get(item.snackId);
      if (!snack) {
        missingItemIds.push(item.id);
        continue;
      }
      const subtotal = snack.price * item.quantity;
      total += subtotal;
      lineItems.push({
        cartItemId: item.id,
        snackId: snack.id,
        snackName: snack.name,
        price: snack.price,
        quantity: item.quantity,
        subtotal,
        available: availableStock(snack, this.stockRules),
      });
    }

    return { cartId: cart.id, lineItems, total, missingItemIds };
  }

  /**
   * Turns the customer's cart into an order, its items, a pending payment
   * and the matching stock decrements. Either all of it is written or none
   * of it: any failing line leaves the cart, stock and order history as
   * they were.
   */
  async confirmOrder(
    customer: CustomerPrincipal,
    method: PaymentMethod
  ): Promise<CheckoutResult> {
    const cart = await this.carts.getOrCreateCart(customer);

    try {
      return await this.store.transaction((tx) => this.placeOrder(tx, customer, cart.id, method));
    } catch (error) {
      // A decrement lost a race with another checkout; the transaction is rolled back
      if (error instanceof StockFailure) {
        return { ok: false, failures: error.shortages.map(shortageFailure) };
      }
      throw error;
    }
  }

  private async placeOrder(
    tx: ShopStore,
    customer: CustomerPrincipal,
    cartId: string,
    method: PaymentMethod
  ): Promise<CheckoutResult> {
    const items = await tx.listCartItems([cartId]);
    if (items.length === 0) {
      return { ok: false, failures: [{ kind: "empty_cart", message: "Your cart is empty." }] };
    }

    const snacks = await tx.findSnacksByIds(items.map((item) => item.snackId));
    const snackById = new Map(snacks.map((snack) => [snack.id, snack]));

    const failures: CheckoutFailure[] = [];
    const lines: PricedLine[] = [];
    let total = 0;

    for (const item of items) {
      const snack = snackById.get(item.snackId);
      if (!snack) {
        failures.push({
          kind: "missing_snack",
          cartItemId: item.id,
          snackId: item.snackId,
          message: `Item ${item.id} not found.`,
        });
        continue;
      }

      const limit = availableStock(snack, this.stockRules);
      if (limit !== null && limit < item.quantity) {
        failures.push(
          shortageFailure({
            cartItemId: item.id,
            snackId: snack.id,
            snackName: snack.name,
            available: limit,
            requested: item.quantity,
          })
        );
      }

      total += snack.price * item.quantity;
      lines.push({ item, snack, limit });
    }

    if (failures.length > 0) {
      return { ok: false, failures };
    }

    const now = this.clock();
    const order = await tx.createOrder({
      customerId: customer.customerId,
      orderTime: now,
      status: method === "cashless" ? "Paid" : "Pending",
      price: total,
    });

    const orderItems = await tx.createOrderItems(
      lines.map(({ item, snack }) => ({
        orderId: order.id,
        snackId: snack.id,
        snackName: snack.name,
        quantity: item.quantity,
      }))
    );

    // Fixed snack-id order keeps concurrent checkouts from deadlocking
    for (const { item, snack, limit } of [...lines].sort(bySnackId)) {
      if (limit === null) {
        continue;
      }
      const decremented = await tx.decrementStock(snack.id, item.quantity);
      if (!decremented) {
        const current = await tx.findSnackById(snack.id);
        throw new StockFailure([
          {
            cartItemId: item.id,
            snackId: snack.id,
            snackName: snack.name,
            available: current ? current.stock : 0,
            requested: item.quantity,
          },
        ]);
      }
    }

    const payment = await tx.createPayment({
      orderId: order.id,
      mode: method === "cash" ? "Cash" : "Cashless",
      status: "Pending",
      paymentTime: now,
    });

    await tx.clearCart(cartId);

    console.log(
      `🧾 Order ${order.id} placed by customer ${customer.customerId}: ${total} (${method})`
    );

    return { ok: true, order, items: orderItems, payment };
  }
}
