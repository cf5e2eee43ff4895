import express from "express";
import { createCartController } from "../controllers/cart";
import type { Auth } from "../middlewares/auth";
import type { CartService } from "../services/cartService";

export const createCartRoutes = (carts: CartService, auth: Auth) => {
  const { getCart, getCartCount, addToCart, updateCartItem } = createCartController(carts);
  const router = express.Router();

  router.get("/count", auth.optionalAuth, getCartCount);

  router.use(auth.authenticate, auth.authorize("customer"));
  router.get("/", getCart);
  router.post("/items", addToCart);
  router.patch("/items/:cartItemId", updateCartItem);

  return router;
};
