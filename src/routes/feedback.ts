import express from "express";
import { createFeedbackController } from "../controllers/feedback";
import type { Auth } from "../middlewares/auth";
import type { FeedbackService } from "../services/feedbackService";

export const createFeedbackRoutes = (feedback: FeedbackService, auth: Auth) => {
  const { submitFeedback } = createFeedbackController(feedback);
  const router = express.Router();

  router.use(auth.authenticate, auth.authorize("customer"));
  router.post("/", submitFeedback);

  return router;
};
