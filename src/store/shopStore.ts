import type {
  CartItemRecord,
  CartRecord,
  CustomerRecord,
  FeedbackRecord,
  NewCustomer,
  NewFeedback,
  NewOrder,
  NewOrderItem,
  NewPayment,
  NewSnack,
  OrderItemRecord,
  OrderRecord,
  OrderStatus,
  PaymentMode,
  PaymentRecord,
  PaymentStatus,
  SnackPatch,
  SnackRecord,
} from "../types";

export interface OrderFilter {
  customerId?: string;
  since?: Date;
  status?: OrderStatus;
  limit?: number;
}

export interface PaymentFilter {
  since?: Date;
  status?: PaymentStatus;
  mode?: PaymentMode;
}

/**
 * Persistence boundary for every service. Ids are opaque strings; a
 * malformed id behaves like an unknown one (lookups return null, updates
 * report nothing changed).
 *
 * Lists come back in a fixed order: carts oldest first, snacks in creation
 * order, orders/payments/feedback newest first.
 */
export interface ShopStore {
  /**
   * Runs `work` against a store bound to one transaction. Everything it
   * writes is committed together or not at all. Calling `transaction` on an
   * already transactional store just runs `work` in the same transaction.
   */
  transaction<T>(work: (tx: ShopStore) => Promise<T>): Promise<T>;

  createCustomer(input: NewCustomer): Promise<CustomerRecord>;
  findCustomerById(id: string): Promise<CustomerRecord | null>;
  /** Matches either the e-mail address or the mobile number. */
  findCustomerByLogin(identifier: string): Promise<CustomerRecord | null>;
  findCustomerByEmailOrMobile(email: string, mobile: string): Promise<CustomerRecord | null>;
  /**
   * Removes the customer with their carts, cart items and feedback. Their
   * orders stay, with `customerId` set to null.
   */
  deleteCustomer(id: string): Promise<boolean>;

  listSnacks(): Promise<SnackRecord[]>;
  countSnacks(): Promise<number>;
  findSnackById(id: string): Promise<SnackRecord | null>;
  findSnacksByIds(ids: string[]): Promise<SnackRecord[]>;
  createSnack(input: NewSnack): Promise<SnackRecord>;
  /** Inserts the snack unless one with the same name exists. True when inserted. */
  createSnackIfMissing(input: NewSnack): Promise<boolean>;
  updateSnack(id: string, patch: SnackPatch): Promise<SnackRecord | null>;
  deleteSnack(id: string): Promise<boolean>;
  /**
   * Takes `quantity` off a snack's stock only if at least that much is left.
   * Returns false (and changes nothing) otherwise.
   */
  decrementStock(snackId: string, quantity: number): Promise<boolean>;

  listCartsForCustomer(customerId: string): Promise<CartRecord[]>;
  listCustomerIdsWithDuplicateCarts(): Promise<string[]>;
  createCart(customerId: string): Promise<CartRecord>;
  /** Deletes the carts together with their items. */
  deleteCarts(cartIds: string[]): Promise<void>;

  listCartItems(cartIds: string[]): Promise<CartItemRecord[]>;
  findCartItem(cartId: string, cartItemId: string): Promise<CartItemRecord | null>;
  /** Adds `quantity` to the (cart, snack) line, creating it when missing. */
  incrementCartItem(cartId: string, snackId: string, quantity: number): Promise<CartItemRecord>;
  /**
   * Adds `delta` to a line's quantity in one step, only when the result stays
   * between 1 and `max` (no upper bound when null). Returns the updated line,
   * or null when the line is gone or the bound refused the change.
   */
  adjustCartItemQuantity(
    cartItemId: string,
    delta: number,
    max: number | null
  ): Promise<CartItemRecord | null>;
  deleteCartItem(cartItemId: string): Promise<void>;
  clearCart(cartId: string): Promise<void>;

  createOrder(input: NewOrder): Promise<OrderRecord>;
  findOrderById(id: string): Promise<OrderRecord | null>;
  listOrders(filter: OrderFilter): Promise<OrderRecord[]>;
  setOrderStatus(id: string, status: OrderStatus): Promise<OrderRecord | null>;
  createOrderItems(items: NewOrderItem[]): Promise<OrderItemRecord[]>;
  listOrderItems(orderId: string): Promise<OrderItemRecord[]>;

  createPayment(input: NewPayment): Promise<PaymentRecord>;
  findPaymentById(id: string): Promise<PaymentRecord | null>;
  listPaymentsForOrder(orderId: string): Promise<PaymentRecord[]>;
  listPayments(filter: PaymentFilter): Promise<PaymentRecord[]>;
  setPaymentStatus(id: string, status: PaymentStatus): Promise<PaymentRecord | null>;

  createFeedback(input: NewFeedback): Promise<FeedbackRecord>;
  listFeedback(): Promise<FeedbackRecord[]>;
  deleteFeedback(id: string): Promise<boolean>;
}
