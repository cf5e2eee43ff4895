import type { AppConfig } from "../config/env";
import type { ShopStore } from "../store/shopStore";
import type { Clock } from "../types";
import { AccountService } from "./accountService";
import { CartService } from "./cartService";
import { CheckoutService } from "./checkoutService";
import { FeedbackService } from "./feedbackService";
import { InventoryService } from "./inventoryService";
import { OrderQueryService } from "./orderQueryService";
import { statusPolicyFor } from "./statusPolicy";
import { StatusService } from "./statusService";
import type { StockRules } from "./stock";

export interface Services {
  accounts: AccountService;
  inventory: InventoryService;
  carts: CartService;
  checkout: CheckoutService;
  statuses: StatusService;
  orders: OrderQueryService;
  feedback: FeedbackService;
}

export const createServices = (store: ShopStore, config: AppConfig, clock: Clock): Services => {
  const stockRules: StockRules = { zeroStockUnlimited: config.zeroStockUnlimited };
  const carts = new CartService(store, stockRules);
  const statuses = new StatusService(store, statusPolicyFor(config.statusPolicy));

  return {
    accounts: new AccountService(store, config),
    inventory: new InventoryService(store),
    carts,
    checkout: new CheckoutService(store, carts, stockRules, clock),
    statuses,
    orders: new OrderQueryService(store, statuses, config.timeZone, clock),
    feedback: new FeedbackService(store, config.feedbackMaxLength, clock),
  };
};
