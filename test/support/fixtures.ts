import { loadConfig, type AppConfig } from "../../src/config/env";
import { createServices, type Services } from "../../src/services";
import type { Clock, CustomerPrincipal, OwnerPrincipal, SnackRecord } from "../../src/types";
import { MemoryShopStore } from "./memoryStore";

export const OWNER_EMAIL = "owner@snacks.test";
export const OWNER_PASSWORD = "owner-pass";

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  loadConfig({
    NODE_ENV: "test",
    JWT_SECRET: "test-secret",
    OWNER_EMAIL,
    OWNER_PASSWORD,
    BCRYPT_ROUNDS: "4",
    TIME_ZONE: "Asia/Kolkata",
    ...env,
  });

/** A clock the test can move. */
export const manualClock = (iso: string) => {
  let now = new Date(iso);
  const clock: Clock = () => new Date(now.getTime());
  return {
    clock,
    set: (next: string) => {
      now = new Date(next);
    },
  };
};

export const owner: OwnerPrincipal = { role: "owner", email: OWNER_EMAIL };

export interface World {
  store: MemoryShopStore;
  config: AppConfig;
  services: Services;
}

export const createWorld = (options: { env?: Record<string, string>; clock?: Clock } = {}): World => {
  const store = new MemoryShopStore();
  const config = testConfig(options.env);
  const services = createServices(store, config, options.clock ?? (() => new Date()));
  return { store, config, services };
};

export const addCustomer = async (
  store: MemoryShopStore,
  name = "Asha Patil",
  mobile = "9000000001"
): Promise<CustomerPrincipal> => {
  const customer = await store.createCustomer({
    name,
    email: `${mobile}@example.com`,
    mobile,
    passwordHash: "not-a-real-hash",
  });
  return { role: "customer", customerId: customer.id, name: customer.name };
};

export const addSnack = async (
  store: MemoryShopStore,
  name: string,
  price: number,
  stock: number,
  stockTracked = true
): Promise<SnackRecord> =>
  store.createSnack({ name, price, stock, stockTracked, image: null });
