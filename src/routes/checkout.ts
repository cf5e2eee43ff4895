import express from "express";
import { createCheckoutController } from "../controllers/checkout";
import type { Auth } from "../middlewares/auth";
import type { CheckoutService } from "../services/checkoutService";

export const createCheckoutRoutes = (checkout: CheckoutService, auth: Auth) => {
  const { getCheckout, confirmOrder } = createCheckoutController(checkout);
  const router = express.Router();

  router.use(auth.authenticate, auth.authorize("customer"));
  router.get("/", getCheckout);
  router.post("/confirm", confirmOrder);

  return router;
};
