import type { NextFunction, Response } from "express";
import type { AuthRequest } from "../middlewares/auth";
import type { OrderQueryService } from "../services/orderQueryService";
import { assertCustomer } from "../utils/principal";

export const createOrderController = (orders: OrderQueryService) => {
  const getOrders = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const list = await orders.listOrders(assertCustomer(req.principal));
      res.json({ success: true, orders: list });
    } catch (error) {
      next(error);
    }
  };

  const getTodaysOrders = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const list = await orders.todaysOrderStatuses(assertCustomer(req.principal));
      res.json({ success: true, orders: list });
    } catch (error) {
      next(error);
    }
  };

  const getOrder = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const customer = assertCustomer(req.principal);
      const detail = await orders.orderDetail(customer, req.params.orderId);
      res.json({ success: true, ...detail });
    } catch (error) {
      next(error);
    }
  };

  const getOrderStatus = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const customer = assertCustomer(req.principal);
      const status = await orders.orderStatus(customer, req.params.orderId);
      res.json({ success: true, ...status });
    } catch (error) {
      next(error);
    }
  };

  return { getOrders, getTodaysOrders, getOrder, getOrderStatus };
};
