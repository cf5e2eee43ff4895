import type { NextFunction, Response } from "express";
import type { AppConfig } from "../config/env";
import type { AuthRequest } from "../middlewares/auth";
import type { AccountService } from "../services/accountService";
import type { Principal } from "../types";
import { AuthorizationFailure } from "../utils/errors";
import { readBody } from "../utils/request";
import { signToken, TOKEN_COOKIE } from "../utils/token";

export const createAuthController = (accounts: AccountService, config: AppConfig) => {
  const setSessionCookie = (res: Response, principal: Principal): string => {
    const token = signToken(
      {
        role: principal.role,
        sub: principal.role === "owner" ? principal.email : principal.customerId,
      },
      config
    );
    res.cookie(TOKEN_COOKIE, token, {
      httpOnly: true,
      secure: config.nodeEnv === "production",
      sameSite: "lax",
      maxAge: config.jwtExpiresInSeconds * 1000,
    });
    return token;
  };

  const clearSessionCookie = (res: Response): void => {
    res.cookie(TOKEN_COOKIE, "", {
      httpOnly: true,
      expires: new Date(0),
    });
  };

  const register = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const customer = await accounts.register(readBody(req));
      res.status(201).json({
        success: true,
        message: "Registration successful. Please log in.",
        customer,
      });
    } catch (error) {
      next(error);
    }
  };

  const login = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = readBody(req);
      const principal = await accounts.login(body.identifier ?? body.email, body.password);
      const token = setSessionCookie(res, principal);
      res.json({ success: true, token, principal });
    } catch (error) {
      next(error);
    }
  };

  const logout = async (req: AuthRequest, res: Response): Promise<void> => {
    clearSessionCookie(res);
    res.json({ success: true, message: "Logged out successfully" });
  };

  const getMe = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.principal) {
        throw new AuthorizationFailure("Authentication required");
      }
      const account = await accounts.describe(req.principal);
      res.json({ success: true, account });
    } catch (error) {
      next(error);
    }
  };

  const deleteMe = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await accounts.deleteAccount(req.principal);
      clearSessionCookie(res);
      res.json({
        success: true,
        message: "Your account has been deleted. Your previous orders are kept for records.",
      });
    } catch (error) {
      next(error);
    }
  };

  return { register, login, logout, getMe, deleteMe };
};
