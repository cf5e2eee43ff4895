import express from "express";
import type { AppConfig } from "../config/env";
import { createAuthController } from "../controllers/auth";
import type { Auth } from "../middlewares/auth";
import type { AccountService } from "../services/accountService";

export const createAuthRoutes = (accounts: AccountService, config: AppConfig, auth: Auth) => {
  const { register, login, logout, getMe, deleteMe } = createAuthController(accounts, config);
  const router = express.Router();

  router.post("/register", register);
  router.post("/login", login);
  router.post("/logout", logout);
  router.get("/me", auth.authenticate, getMe);
  router.delete("/me", auth.authenticate, auth.authorize("customer"), deleteMe);

  return router;
};
