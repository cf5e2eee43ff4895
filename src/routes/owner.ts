import express from "express";
import { createOwnerController } from "../controllers/owner";
import type { Auth } from "../middlewares/auth";
import type { Services } from "../services";

export const createOwnerRoutes = (services: Services, auth: Auth) => {
  const owner = createOwnerController(services);
  const router = express.Router();

  router.use(auth.authenticate, auth.authorize("owner"));

  router.get("/orders", owner.getTodaysOrders);
  router.get("/orders/:orderId", owner.getOrder);
  router.patch("/orders/:orderId/status", owner.updateOrderStatus);

  router.get("/payments", owner.getTodaysPayments);
  router.patch("/payments/:paymentId/status", owner.updatePaymentStatus);

  router.get("/snacks", owner.getInventory);
  router.post("/snacks", owner.addSnack);
  router.patch("/snacks/:snackId", owner.updateSnack);
  router.delete("/snacks/:snackId", owner.deleteSnack);

  router.get("/feedback", owner.getFeedback);
  router.delete("/feedback/:feedbackId", owner.deleteFeedback);

  return router;
};
