import bcrypt from "bcryptjs";
import type { AppConfig } from "../config/env";
import type { ShopStore } from "../store/shopStore";
import type { CustomerPrincipal, CustomerRecord, Principal } from "../types";
import {
  AuthorizationFailure,
  ConflictError,
  NotFoundError,
  ValidationFailure,
} from "../utils/errors";
import { assertCustomer } from "../utils/principal";

export interface RegisterInput {
  name?: unknown;
  email?: unknown;
  mobile?: unknown;
  password?: unknown;
  confirmPassword?: unknown;
}

/** A customer as the API shows it: never the password hash. */
export interface CustomerProfile {
  id: string;
  name: string;
  email: string;
  mobile: string;
  createdAt: string;
}

export type AccountView =
  | { role: "customer"; customer: CustomerProfile }
  | { role: "owner"; email: string };

const NAME_PATTERN = /^[A-Za-z\s]{2,100}$/;
const MOBILE_PATTERN = /^\d{10}$/;
const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
export const MIN_PASSWORD_LENGTH = 6;

const text = (value: unknown): string => (typeof value === "string" ? value.trim() : "");

export const toProfile = (customer: CustomerRecord): CustomerProfile => ({
  id: customer.id,
  name: customer.name,
  email: customer.email,
  mobile: customer.mobile,
  createdAt: customer.createdAt.toISOString(),
});

type AccountConfig = Pick<AppConfig, "ownerEmail" | "ownerPassword" | "bcryptRounds">;

export class AccountService {
  constructor(
    private readonly store: ShopStore,
    private readonly config: AccountConfig
  ) {}

  async register(input: RegisterInput): Promise<CustomerProfile> {
    const name = text(input.name).replace(/\s+/g, " ");
    const email = text(input.email).toLowerCase();
    const mobile = text(input.mobile);
    const password = typeof input.password === "string" ? input.password : "";

    if (!NAME_PATTERN.test(name)) {
      throw new ValidationFailure("Name must contain only letters and spaces (2-100 characters).");
    }
    if (!MOBILE_PATTERN.test(mobile)) {
      throw new ValidationFailure("Mobile number must be exactly 10 digits.");
    }
    if (!EMAIL_PATTERN.test(email)) {
      throw new ValidationFailure("Please enter a valid email address.");
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationFailure(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters.`
      );
    }
    if (input.confirmPassword !== undefined && input.confirmPassword !== password) {
      throw new ValidationFailure("Passwords do not match.");
    }
    // The owner logs in with these credentials; a customer cannot take them
    if (email === this.config.ownerEmail) {
      throw new ConflictError("This email is already registered.");
    }

    const existing = await this.store.findCustomerByEmailOrMobile(email, mobile);
    if (existing) {
      throw new ConflictError(
        existing.email === email
          ? "This email is already registered."
          : "This mobile number is already registered."
      );
    }

    const passwordHash = await bcrypt.hash(password, this.config.bcryptRounds);
    const customer = await this.store.createCustomer({ name, email, mobile, passwordHash });
    console.log(`👤 Registered customer ${customer.id}`);
    return toProfile(customer);
  }

  /** Email or mobile plus password. The owner signs in through the same form. */
  async login(identifier: unknown, password: unknown): Promise<Principal> {
    const login = text(identifier);
    const secret = typeof password === "string" ? password : "";
    if (!login || !secret) {
      throw new ValidationFailure("Email/mobile and password are required");
    }

    if (login.toLowerCase() === this.config.ownerEmail && secret === this.config.ownerPassword) {
      return { role: "owner", email: this.config.ownerEmail };
    }

    const customer = await this.store.findCustomerByLogin(login);
    if (!customer || !(await bcrypt.compare(secret, customer.passwordHash))) {
      throw new AuthorizationFailure("Invalid email/mobile or password.");
    }
    return { role: "customer", customerId: customer.id, name: customer.name };
  }

  /** Resolves the principal for a token subject, or null when it no longer exists. */
  async resolveCustomer(customerId: string): Promise<CustomerPrincipal | null> {
    const customer = await this.store.findCustomerById(customerId);
    return customer ? { role: "customer", customerId: customer.id, name: customer.name } : null;
  }

  async describe(principal: Principal): Promise<AccountView> {
    if (principal.role === "owner") {
      return { role: "owner", email: principal.email };
    }
    const customer = await this.store.findCustomerById(principal.customerId);
    if (!customer) {
      throw new NotFoundError("Customer not found");
    }
    return { role: "customer", customer: toProfile(customer) };
  }

  /** Orders and payments stay on record with no customer attached. */
  async deleteAccount(principal: Principal | undefined): Promise<void> {
    if (principal && principal.role === "owner") {
      throw new AuthorizationFailure("Owner account cannot be deleted from here.", 403);
    }
    const customer = assertCustomer(principal);
    const deleted = await this.store.transaction((tx) => tx.deleteCustomer(customer.customerId));
    if (!deleted) {
      throw new NotFoundError("Customer not found");
    }
    console.log(`🗑️  Deleted customer ${customer.customerId}`);
  }
}
