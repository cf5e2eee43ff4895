import type { ShopStore } from "../store/shopStore";
import {
  ORDER_STATUSES,
  PAYMENT_MODES,
  PAYMENT_STATUSES,
  type PaymentMode,
  type OrderRecord,
  type OrderStatus,
  type PaymentRecord,
  type PaymentStatus,
  type Principal,
} from "../types";
import { NotFoundError, ValidationFailure } from "../utils/errors";
import { assertOwner } from "../utils/principal";
import type { StatusPolicy } from "./statusPolicy";

export const parseOrderStatus = (value: unknown): OrderStatus => {
  const status = ORDER_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationFailure(`Order status must be one of: ${ORDER_STATUSES.join(", ")}`);
  }
  return status;
};

export const parsePaymentStatus = (value: unknown): PaymentStatus => {
  const status = PAYMENT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationFailure(
      `Payment status must be one of: ${PAYMENT_STATUSES.join(", ")}`
    );
  }
  return status;
};

export const parsePaymentMode = (value: unknown): PaymentMode => {
  const mode = PAYMENT_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ValidationFailure(`Payment mode must be one of: ${PAYMENT_MODES.join(", ")}`);
  }
  return mode;
};

export class StatusService {
  constructor(
    private readonly store: ShopStore,
    private readonly policy: StatusPolicy
  ) {}

  async setOrderStatus(
    principal: Principal | undefined,
    orderId: string,
    status: unknown
  ): Promise<OrderRecord> {
    assertOwner(principal);
    const next = parseOrderStatus(status);

    const order = await this.store.findOrderById(orderId);
    if (!order) {
      throw new NotFoundError("Order not found");
    }
    if (!this.policy.canChangeOrder(order.status, next)) {
      throw new ValidationFailure(
        `Order cannot go from ${order.status} to ${next}`,
        "INVALID_TRANSITION"
      );
    }

    const updated = await this.store.setOrderStatus(order.id, next);
    if (!updated) {
      throw new NotFoundError("Order not found");
    }
    return updated;
  }

  async setPaymentStatus(
    principal: Principal | undefined,
    paymentId: string,
    status: unknown
  ): Promise<PaymentRecord> {
    assertOwner(principal);
    const next = parsePaymentStatus(status);

    const payment = await this.store.findPaymentById(paymentId);
    if (!payment) {
      throw new NotFoundError("Payment not found");
    }
    if (!this.policy.canChangePayment(payment.status, next)) {
      throw new ValidationFailure(
        `Payment cannot go from ${payment.status} to ${next}`,
        "INVALID_TRANSITION"
      );
    }

    const updated = await this.store.setPaymentStatus(payment.id, next);
    if (!updated) {
      throw new NotFoundError("Payment not found");
    }
    return updated;
  }

  /** The payment that currently speaks for the order (newest paymentTime). */
  async latestPaymentForOrder(orderId: string): Promise<PaymentRecord | null> {
    const payments = await this.store.listPaymentsForOrder(orderId);
    return payments[0] ?? null;
  }
}
