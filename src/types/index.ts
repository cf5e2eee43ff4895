// Plain records passed between the store and the services.
// Mongoose documents are mapped onto these in store/mongoShopStore.ts.

export const ORDER_STATUSES = [
  "Pending",
  "Paid",
  "Preparing",
  "Ready",
  "Completed",
  "Cancelled",
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_STATUSES = ["Pending", "Completed", "Failed"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_MODES = ["Cash", "Cashless"] as const;
export type PaymentMode = (typeof PAYMENT_MODES)[number];

export const PAYMENT_METHODS = ["cash", "cashless"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface CustomerRecord {
  id: string;
  name: string;
  email: string;
  mobile: string;
  passwordHash: string;
  createdAt: Date;
}

export interface SnackRecord {
  id: string;
  name: string;
  price: number;
  stock: number;
  stockTracked: boolean;
  image: string | null;
  createdAt: Date;
}

export interface CartRecord {
  id: string;
  customerId: string;
  createdAt: Date;
}

export interface CartItemRecord {
  id: string;
  cartId: string;
  snackId: string;
  quantity: number;
}

export interface OrderRecord {
  id: string;
  customerId: string | null;
  orderTime: Date;
  status: OrderStatus;
  price: number;
}

export interface OrderItemRecord {
  id: string;
  orderId: string;
  snackId: string;
  snackName: string;
  quantity: number;
}

export interface PaymentRecord {
  id: string;
  orderId: string;
  mode: PaymentMode;
  status: PaymentStatus;
  paymentTime: Date;
}

export interface FeedbackRecord {
  id: string;
  customerId: string;
  rating: number | null;
  content: string;
  feedbackTime: Date;
}

export type NewCustomer = Omit<CustomerRecord, "id" | "createdAt">;
export type NewSnack = Omit<SnackRecord, "id" | "createdAt">;
export type SnackPatch = Partial<NewSnack>;
export type NewOrder = Omit<OrderRecord, "id">;
export type NewOrderItem = Omit<OrderItemRecord, "id">;
export type NewPayment = Omit<PaymentRecord, "id">;
export type NewFeedback = Omit<FeedbackRecord, "id">;

export type CustomerPrincipal = {
  role: "customer";
  customerId: string;
  name: string;
};

export type OwnerPrincipal = {
  role: "owner";
  email: string;
};

export type Principal = CustomerPrincipal | OwnerPrincipal;

export type Role = Principal["role"];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
