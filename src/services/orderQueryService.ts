import type { ShopStore } from "../store/shopStore";
import type {
  Clock,
  CustomerPrincipal,
  OrderItemRecord,
  OrderRecord,
  OrderStatus,
  PaymentMode,
  PaymentRecord,
  PaymentStatus,
  Principal,
} from "../types";
import { NotFoundError } from "../utils/errors";
import { isSameLocalDay, localDayLookback } from "../utils/localDate";
import { assertOwner } from "../utils/principal";
import type { StatusService } from "./statusService";

/** What the order-tracking page polls for. */
export interface OrderStatusView {
  orderId: string;
  status: OrderStatus;
  price: number;
  orderTime: string;
  paymentStatus: PaymentStatus | null;
  paymentMode: PaymentMode | null;
}

export interface OrderDetail {
  order: OrderRecord;
  items: OrderItemRecord[];
  payment: PaymentRecord | null;
}

export const TODAYS_ORDERS_LIMIT = 10;

export class OrderQueryService {
  constructor(
    private readonly store: ShopStore,
    private readonly statuses: StatusService,
    private readonly timeZone: string,
    private readonly clock: Clock
  ) {}

  async listOrders(customer: CustomerPrincipal): Promise<OrderRecord[]> {
    return this.store.listOrders({ customerId: customer.customerId });
  }

  /** The customer's orders placed on today's local date, newest first. */
  async todaysOrders(customer: CustomerPrincipal, limit?: number): Promise<OrderRecord[]> {
    const now = this.clock();
    const recent = await this.store.listOrders({
      customerId: customer.customerId,
      since: localDayLookback(now),
    });
    const today = recent.filter((order) => isSameLocalDay(order.orderTime, now, this.timeZone));
    return limit === undefined ? today : today.slice(0, limit);
  }

  async todaysOrderStatuses(customer: CustomerPrincipal): Promise<OrderStatusView[]> {
    const orders = await this.todaysOrders(customer, TODAYS_ORDERS_LIMIT);
    return Promise.all(orders.map((order) => this.toStatusView(order)));
  }

  async orderStatus(customer: CustomerPrincipal, orderId: string): Promise<OrderStatusView> {
    const order = await this.store.findOrderById(orderId);
    if (!order || order.customerId !== customer.customerId) {
      throw new NotFoundError("Order not found");
    }
    return this.toStatusView(order);
  }

  /** Customers only see their own orders; the owner sees any. */
  async orderDetail(principal: Principal, orderId: string): Promise<OrderDetail> {
    const order = await this.store.findOrderById(orderId);
    if (
      !order ||
      (principal.role === "customer" && order.customerId !== principal.customerId)
    ) {
      throw new NotFoundError("Order not found");
    }
    const [items, payment] = await Promise.all([
      this.store.listOrderItems(order.id),
      this.statuses.latestPaymentForOrder(order.id),
    ]);
    return { order, items, payment };
  }

  async ownerTodaysOrders(
    principal: Principal | undefined,
    filter: { status?: OrderStatus } = {}
  ): Promise<OrderRecord[]> {
    assertOwner(principal);
    const now = this.clock();
    const recent = await this.store.listOrders({
      since: localDayLookback(now),
      status: filter.status,
    });
    return recent.filter((order) => isSameLocalDay(order.orderTime, now, this.timeZone));
  }

  async ownerTodaysPayments(
    principal: Principal | undefined,
    filter: { status?: PaymentStatus; mode?: PaymentMode } = {}
  ): Promise<PaymentRecord[]> {
    assertOwner(principal);
    const now = this.clock();
    const recent = await this.store.listPayments({
      since: localDayLookback(now),
      status: filter.status,
      mode: filter.mode,
    });
    return recent.filter((payment) =>
      isSameLocalDay(payment.paymentTime, now, this.timeZone)
    );
  }

  private async toStatusView(order: OrderRecord): Promise<OrderStatusView> {
    const payment = await this.statuses.latestPaymentForOrder(order.id);
    return {
      orderId: order.id,
      status: order.status,
      price: order.price,
      orderTime: order.orderTime.toISOString(),
      paymentStatus: payment ? payment.status : null,
      paymentMode: payment ? payment.mode : null,
    };
  }
}
