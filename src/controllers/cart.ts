import type { NextFunction, Response } from "express";
import type { AuthRequest } from "../middlewares/auth";
import type { CartService } from "../services/cartService";
import { assertCustomer } from "../utils/principal";
import { readBody } from "../utils/request";

const OUTCOME_MESSAGES = {
  updated: "Cart updated",
  removed: "Item removed from cart",
  unchanged: "No more stock available for this item",
  not_found: "Item is no longer in your cart",
} as const;

export const createCartController = (carts: CartService) => {
  const getCart = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const cart = await carts.getCartView(assertCustomer(req.principal));
      res.json({ success: true, cart });
    } catch (error) {
      next(error);
    }
  };

  // Works for anonymous visitors too, who always have 0
  const getCartCount = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const customer = req.principal && req.principal.role === "customer" ? req.principal : null;
      const cartCount = await carts.cartItemCount(customer);
      res.json({ success: true, cartCount });
    } catch (error) {
      next(error);
    }
  };

  const addToCart = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const customer = assertCustomer(req.principal);
      const body = readBody(req);
      const snackId = typeof body.snackId === "string" ? body.snackId : "";
      const cartCount = await carts.addItem(customer, snackId, body.quantity);
      res.json({ success: true, message: "Added to cart", cartCount });
    } catch (error) {
      next(error);
    }
  };

  const updateCartItem = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const customer = assertCustomer(req.principal);
      const outcome = await carts.updateItem(
        customer,
        req.params.cartItemId,
        readBody(req).action
      );
      const cartCount = await carts.cartItemCount(customer);
      res.json({ success: true, outcome, message: OUTCOME_MESSAGES[outcome], cartCount });
    } catch (error) {
      next(error);
    }
  };

  return { getCart, getCartCount, addToCart, updateCartItem };
};
