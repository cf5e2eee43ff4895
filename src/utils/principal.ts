import type { CustomerPrincipal, OwnerPrincipal, Principal } from "../types";
import { AuthorizationFailure } from "./errors";

export const assertCustomer = (principal: Principal | undefined): CustomerPrincipal => {
  if (!principal) {
    throw new AuthorizationFailure("Please log in to continue");
  }
  if (principal.role !== "customer") {
    throw new AuthorizationFailure("Only customers can do this", 403);
  }
  return principal;
};

export const assertOwner = (principal: Principal | undefined): OwnerPrincipal => {
  if (!principal) {
    throw new AuthorizationFailure("Please log in to continue");
  }
  if (principal.role !== "owner") {
    throw new AuthorizationFailure("Access denied", 403);
  }
  return principal;
};
