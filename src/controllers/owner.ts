import type { NextFunction, Response } from "express";
import type { AuthRequest } from "../middlewares/auth";
import type { Services } from "../services";
import {
  parseOrderStatus,
  parsePaymentMode,
  parsePaymentStatus,
} from "../services/statusService";
import { assertOwner } from "../utils/principal";
import { readBody } from "../utils/request";

type OwnerServices = Pick<Services, "orders" | "statuses" | "inventory" | "feedback">;

export const createOwnerController = ({ orders, statuses, inventory, feedback }: OwnerServices) => {
  const getTodaysOrders = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { status } = req.query;
      const list = await orders.ownerTodaysOrders(req.principal, {
        status: status === undefined ? undefined : parseOrderStatus(status),
      });
      res.json({ success: true, orders: list });
    } catch (error) {
      next(error);
    }
  };

  const getOrder = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const detail = await orders.orderDetail(assertOwner(req.principal), req.params.orderId);
      res.json({ success: true, ...detail });
    } catch (error) {
      next(error);
    }
  };

  const updateOrderStatus = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const order = await statuses.setOrderStatus(
        req.principal,
        req.params.orderId,
        readBody(req).status
      );
      res.json({ success: true, order });
    } catch (error) {
      next(error);
    }
  };

  const getTodaysPayments = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { status, mode } = req.query;
      const payments = await orders.ownerTodaysPayments(req.principal, {
        status: status === undefined ? undefined : parsePaymentStatus(status),
        mode: mode === undefined ? undefined : parsePaymentMode(mode),
      });
      res.json({ success: true, payments });
    } catch (error) {
      next(error);
    }
  };

  const updatePaymentStatus = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const payment = await statuses.setPaymentStatus(
        req.principal,
        req.params.paymentId,
        readBody(req).status
      );
      res.json({ success: true, payment });
    } catch (error) {
      next(error);
    }
  };

  const getInventory = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const snacks = await inventory.listSnacks();
      res.json({ success: true, snacks });
    } catch (error) {
      next(error);
    }
  };

  const addSnack = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const snack = await inventory.addSnack(req.principal, readBody(req));
      res.status(201).json({ success: true, message: "Snack added successfully.", snack });
    } catch (error) {
      next(error);
    }
  };

  const updateSnack = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const snack = await inventory.updateSnack(req.principal, req.params.snackId, readBody(req));
      res.json({ success: true, snack });
    } catch (error) {
      next(error);
    }
  };

  const deleteSnack = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await inventory.deleteSnack(req.principal, req.params.snackId);
      res.json({ success: true, message: "Snack deleted" });
    } catch (error) {
      next(error);
    }
  };

  const getFeedback = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const entries = await feedback.listFeedback(req.principal);
      res.json({ success: true, feedback: entries });
    } catch (error) {
      next(error);
    }
  };

  const deleteFeedback = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await feedback.deleteFeedback(req.principal, req.params.feedbackId);
      res.json({ success: true, message: "Feedback deleted" });
    } catch (error) {
      next(error);
    }
  };

  return {
    getTodaysOrders,
    getOrder,
    updateOrderStatus,
    getTodaysPayments,
    updatePaymentStatus,
    getInventory,
    addSnack,
    updateSnack,
    deleteSnack,
    getFeedback,
    deleteFeedback,
  };
};
