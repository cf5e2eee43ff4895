import type { ShopStore } from "../store/shopStore";
import type { CartRecord, CustomerPrincipal, SnackRecord } from "../types";
import { NotFoundError, ValidationFailure } from "../utils/errors";
import { availableStock, type StockRules } from "./stock";

export const CART_ACTIONS = ["increase", "decrease", "remove"] as const;
export type CartAction = (typeof CART_ACTIONS)[number];

export type CartItemOutcome = "updated" | "removed" | "unchanged" | "not_found";

export interface CartLine {
  cartItemId: string;
  snackId: string;
  snackName: string | null;
  price: number;
  quantity: number;
  subtotal: number;
  available: number | null;
  missing: boolean;
}

export interface CartView {
  cartId: string;
  items: CartLine[];
  total: number;
  count: number;
}

const isCartAction = (value: unknown): value is CartAction =>
  CART_ACTIONS.some((action) => action === value);

// Anything that is not a whole number >= 1 becomes 1
export const normalizeQuantity = (value: unknown): number => {
  let parsed = Number.NaN;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    parsed = Number(value.trim());
  }
  if (!Number.isFinite(parsed)) {
    return 1;
  }
  const whole = Math.trunc(parsed);
  return whole < 1 ? 1 : whole;
};

export class CartService {
  constructor(
    private readonly store: ShopStore,
    private readonly stockRules: StockRules
  ) {}

  /**
   * Returns the customer's single cart, creating it on first use. Carts
   * left over from before the one-cart rule are folded into the oldest.
   */
  async getOrCreateCart(customer: CustomerPrincipal): Promise<CartRecord> {
    const carts = await this.store.listCartsForCustomer(customer.customerId);
    if (carts.length === 0) {
      return this.store.createCart(customer.customerId);
    }
    if (carts.length === 1) {
      return carts[0];
    }
    return this.mergeCartsFor(customer.customerId);
  }

  /** Backfill: merges duplicate carts for every customer that has them. */
  async mergeDuplicateCarts(): Promise<number> {
    const customerIds = await this.store.listCustomerIdsWithDuplicateCarts();
    for (const customerId of customerIds) {
      await this.mergeCartsFor(customerId);
    }
    return customerIds.length;
  }

  private async mergeCartsFor(customerId: string): Promise<CartRecord> {
    return this.store.transaction(async (tx) => {
      const [main, ...extras] = await tx.listCartsForCustomer(customerId);
      if (!main) {
        return tx.createCart(customerId);
      }
      if (extras.length === 0) {
        return main;
      }

      const extraIds = extras.map((cart) => cart.id);
      const extraItems = await tx.listCartItems(extraIds);
      for (const item of extraItems) {
        await tx.incrementCartItem(main.id, item.snackId, item.quantity);
      }
      await tx.deleteCarts(extraIds);

      console.warn(
        `🛒 Merged ${extras.length} duplicate cart(s) into cart ${main.id} for customer ${customerId}`
      );
      return main;
    });
  }

  /** Adds to the snack's line (creating it) and returns the new cart count. */
  async addItem(
    customer: CustomerPrincipal,
    snackId: string,
    quantity: unknown
  ): Promise<number> {
    const snack = await this.store.findSnackById(snackId);
    if (!snack) {
      throw new NotFoundError("Snack not found");
    }

    const cart = await this.getOrCreateCart(customer);
    await this.store.incrementCartItem(cart.id, snack.id, normalizeQuantity(quantity));

    return this.countItems([cart.id]);
  }

  async updateItem(
    customer: CustomerPrincipal,
    cartItemId: string,
    action: unknown
  ): Promise<CartItemOutcome> {
    if (!isCartAction(action)) {
      throw new ValidationFailure(
        `Action must be one of: ${CART_ACTIONS.join(", ")}`
      );
    }

    const cart = await this.getOrCreateCart(customer);
    // Scoped to the caller's cart: another customer's item id is just not found
    const item = await this.store.findCartItem(cart.id, cartItemId);
    if (!item) {
      return "not_found";
    }

    switch (action) {
      case "increase": {
        const snack = await this.store.findSnackById(item.snackId);
        const limit = snack ? availableStock(snack, this.stockRules) : null;
        const adjusted = await this.store.adjustCartItemQuantity(item.id, 1, limit);
        return adjusted ? "updated" : "unchanged";
      }
      case "decrease": {
        if (await this.store.adjustCartItemQuantity(item.id, -1, null)) {
          return "updated";
        }
        // Already at 1
        await this.store.deleteCartItem(item.id);
        return "removed";
      }
      case "remove":
        await this.store.deleteCartItem(item.id);
        return "removed";
    }
  }

  async getCartView(customer: CustomerPrincipal): Promise<CartView> {
    const cart = await this.getOrCreateCart(customer);
    const items = await this.store.listCartItems([cart.id]);
    const snacks = await this.store.findSnacksByIds(items.map((item) => item.snackId));
    const snackById = new Map<string, SnackRecord>(snacks.map((snack) => [snack.id, snack]));

    let total = 0;
    let count = 0;
    const lines = items.map((item): CartLine => {
      const snack = snackById.get(item.snackId);
      const price = snack ? snack.price : 0;
      const subtotal = price * item.quantity;
      total += subtotal;
      count += item.quantity;
      return {
        cartItemId: item.id,
        snackId: item.snackId,
        snackName: snack ? snack.name : null,
        price,
        quantity: item.quantity,
        subtotal,
        available: snack ? availableStock(snack, this.stockRules) : null,
        missing: !snack,
      };
    });

    return { cartId: cart.id, items: lines, total, count };
  }

  /** Sum of quantities in the customer's cart; 0 with nobody logged in. */
  async cartItemCount(customer: CustomerPrincipal | null): Promise<number> {
    if (!customer) {
      return 0;
    }
    const carts = await this.store.listCartsForCustomer(customer.customerId);
    if (carts.length === 0) {
      return 0;
    }
    return this.countItems(carts.map((cart) => cart.id));
  }

  private async countItems(cartIds: string[]): Promise<number> {
    const items = await this.store.listCartItems(cartIds);
    return items.reduce((sum, item) => sum + item.quantity, 0);
  }
}
