import express from "express";
import { createOrderController } from "../controllers/orders";
import type { Auth } from "../middlewares/auth";
import type { OrderQueryService } from "../services/orderQueryService";

export const createOrderRoutes = (orders: OrderQueryService, auth: Auth) => {
  const { getOrders, getTodaysOrders, getOrder, getOrderStatus } = createOrderController(orders);
  const router = express.Router();

  router.use(auth.authenticate, auth.authorize("customer"));
  router.get("/", getOrders);
  router.get("/today", getTodaysOrders);
  router.get("/:orderId", getOrder);
  router.get("/:orderId/status", getOrderStatus);

  return router;
};
