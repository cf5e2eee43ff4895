import type { NextFunction, Response } from "express";
import type { AuthRequest } from "../middlewares/auth";
import {
  parsePaymentMethod,
  toCheckoutError,
  type CheckoutService,
} from "../services/checkoutService";
import { ValidationFailure } from "../utils/errors";
import { assertCustomer } from "../utils/principal";
import { readBody } from "../utils/request";

export const createCheckoutController = (checkout: CheckoutService) => {
  const getCheckout = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const summary = await checkout.computeCheckoutSummary(assertCustomer(req.principal));
      if (summary.lineItems.length === 0) {
        throw new ValidationFailure("Your cart is empty.", "CART_EMPTY");
      }
      res.json({ success: true, summary });
    } catch (error) {
      next(error);
    }
  };

  // Any client-side total in the body is ignored; the price comes from the catalog
  const confirmOrder = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const customer = assertCustomer(req.principal);
      const method = parsePaymentMethod(readBody(req).paymentMethod);
      const result = await checkout.confirmOrder(customer, method);
      if (!result.ok) {
        throw toCheckoutError(result.failures);
      }
      res.status(201).json({
        success: true,
        message: "Order placed",
        order: result.order,
        items: result.items,
        payment: result.payment,
      });
    } catch (error) {
      next(error);
    }
  };

  return { getCheckout, confirmOrder };
};
