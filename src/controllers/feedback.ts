import type { NextFunction, Response } from "express";
import type { AuthRequest } from "../middlewares/auth";
import type { FeedbackService } from "../services/feedbackService";
import { assertCustomer } from "../utils/principal";
import { readBody } from "../utils/request";

export const createFeedbackController = (feedback: FeedbackService) => {
  const submitFeedback = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const body = readBody(req);
      const entry = await feedback.submitFeedback(assertCustomer(req.principal), {
        rating: body.rating,
        content: body.content,
      });
      res.status(201).json({ success: true, message: "Thanks for your feedback!", feedback: entry });
    } catch (error) {
      next(error);
    }
  };

  return { submitFeedback };
};
