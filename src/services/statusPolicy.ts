import type { StatusPolicyName } from "../config/env";
import type { OrderStatus, PaymentStatus } from "../types";

/**
 * Decides which status changes the owner may make.
 *
 * - permissive: any status can be set from any status (the counter's
 *   historical behaviour)
 * - strict: orders move Pending → Paid → Preparing → Ready → Completed,
 *   with Cancelled open from every non-terminal state; payments move
 *   Pending → Completed | Failed and Failed → Pending
 *
 * Setting the status an order or payment already has is always allowed.
 */
export interface StatusPolicy {
  readonly name: StatusPolicyName;
  canChangeOrder(from: OrderStatus, to: OrderStatus): boolean;
  canChangePayment(from: PaymentStatus, to: PaymentStatus): boolean;
}

const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  Pending: ["Paid", "Cancelled"],
  Paid: ["Preparing", "Cancelled"],
  Preparing: ["Ready", "Cancelled"],
  Ready: ["Completed", "Cancelled"],
  Completed: [],
  Cancelled: [],
};

const PAYMENT_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  Pending: ["Completed", "Failed"],
  Failed: ["Pending"],
  Completed: [],
};

export const permissivePolicy: StatusPolicy = {
  name: "permissive",
  canChangeOrder: () => true,
  canChangePayment: () => true,
};

export const strictPolicy: StatusPolicy = {
  name: "strict",
  canChangeOrder: (from, to) => from === to || ORDER_TRANSITIONS[from].includes(to),
  canChangePayment: (from, to) => from === to || PAYMENT_TRANSITIONS[from].includes(to),
};

export const statusPolicyFor = (name: StatusPolicyName): StatusPolicy =>
  name === "strict" ? strictPolicy : permissivePolicy;
