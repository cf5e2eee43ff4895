import jwt, { JsonWebTokenError, type JwtPayload } from "jsonwebtoken";
import type { AppConfig } from "../config/env";

export const TOKEN_COOKIE = "token";

/** What a session token carries: the role and who it is. */
export interface TokenClaims {
  role: "customer" | "owner";
  sub: string;
}

export const signToken = (
  claims: TokenClaims,
  config: Pick<AppConfig, "jwtSecret" | "jwtExpiresInSeconds">
): string =>
  jwt.sign({ role: claims.role }, config.jwtSecret, {
    subject: claims.sub,
    expiresIn: config.jwtExpiresInSeconds,
  });

/** Returns the claims of a valid token, or null for anything else. */
export const verifyToken = (
  token: string,
  config: Pick<AppConfig, "jwtSecret">
): TokenClaims | null => {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, config.jwtSecret);
  } catch (error) {
    if (error instanceof JsonWebTokenError) {
      return null;
    }
    throw error;
  }

  if (typeof decoded === "string" || typeof decoded.sub !== "string") {
    return null;
  }
  const role: unknown = decoded.role;
  if (role !== "customer" && role !== "owner") {
    return null;
  }
  return { role, sub: decoded.sub };
};
