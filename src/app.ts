import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import type { AppConfig } from "./config/env";
import { createAuth } from "./middlewares/auth";
import errorHandler, { notFound } from "./middlewares/errorHandler";
import { createServices, type Services } from "./services";
import type { ShopStore } from "./store/shopStore";
import { systemClock, type Clock } from "./types";

// Routes
import { createAuthRoutes } from "./routes/auth";
import { createSnackRoutes } from "./routes/snacks";
import { createCartRoutes } from "./routes/cart";
import { createCheckoutRoutes } from "./routes/checkout";
import { createOrderRoutes } from "./routes/orders";
import { createFeedbackRoutes } from "./routes/feedback";
import { createOwnerRoutes } from "./routes/owner";

export interface AppOptions {
  config: AppConfig;
  store: ShopStore;
  clock?: Clock;
}

export const createApp = ({ config, store, clock = systemClock }: AppOptions) => {
  const services: Services = createServices(store, config, clock);
  const auth = createAuth(services.accounts, config);
  const app = express();

  // Middlewares
  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  // Routes
  app.use("/api/auth", createAuthRoutes(services.accounts, config, auth));
  app.use("/api/snacks", createSnackRoutes(services.inventory));
  app.use("/api/cart", createCartRoutes(services.carts, auth));
  app.use("/api/checkout", createCheckoutRoutes(services.checkout, auth));
  app.use("/api/orders", createOrderRoutes(services.orders, auth));
  app.use("/api/feedback", createFeedbackRoutes(services.feedback, auth));
  app.use("/api/owner", createOwnerRoutes(services, auth));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", message: "Server is running" });
  });

  app.use(notFound);
  // Error handler (must be last)
  app.use(errorHandler);

  return { app, services };
};
