import type { Request } from "express";

export type Body = Record<string, unknown>;

// req.body as a plain record; anything else (missing, array, text) is empty
export const readBody = (req: Request): Body => {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
};
