import snackSeed from "../data/snacks.json";
import type { ShopStore } from "../store/shopStore";
import type { Principal, SnackPatch, SnackRecord } from "../types";
import { NotFoundError, ValidationFailure } from "../utils/errors";
import { assertOwner } from "../utils/principal";

export const SEED_STOCK = 100;

export interface SnackInput {
  name?: unknown;
  price?: unknown;
  stock?: unknown;
  stockTracked?: unknown;
  image?: unknown;
}

// Whole number from a form or JSON value; null when it is not one
export const readWholeNumber = (value: unknown): number | null => {
  let parsed = Number.NaN;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    parsed = Number(value.trim());
  }
  if (!Number.isInteger(parsed)) {
    return null;
  }
  return Math.max(parsed, 0);
};

const readName = (value: unknown): string =>
  typeof value === "string" ? value.trim() : "";

const readImage = (value: unknown): string | null => {
  const image = typeof value === "string" ? value.trim() : "";
  return image === "" ? null : image;
};

export class InventoryService {
  constructor(private readonly store: ShopStore) {}

  async listSnacks(): Promise<SnackRecord[]> {
    return this.store.listSnacks();
  }

  async getSnack(snackId: string): Promise<SnackRecord> {
    const snack = await this.store.findSnackById(snackId);
    if (!snack) {
      throw new NotFoundError("Snack not found");
    }
    return snack;
  }

  /**
   * Fills an empty catalog with the default menu. Returns how many were
   * added. Snacks are inserted by name, so overlapping runs add each once.
   */
  async seedSnacksIfEmpty(): Promise<number> {
    if ((await this.store.countSnacks()) > 0) {
      return 0;
    }
    let added = 0;
    for (const entry of snackSeed) {
      const inserted = await this.store.createSnackIfMissing({
        name: entry.name,
        price: entry.price,
        stock: SEED_STOCK,
        stockTracked: true,
        image: entry.image,
      });
      if (inserted) {
        added += 1;
      }
    }
    if (added > 0) {
      console.log(`🍽️  Seeded ${added} snacks`);
    }
    return added;
  }

  async addSnack(principal: Principal | undefined, input: SnackInput): Promise<SnackRecord> {
    assertOwner(principal);
    const name = readName(input.name);
    if (!name) {
      throw new ValidationFailure("Snack name is required.");
    }
    return this.store.createSnack({
      name,
      price: readWholeNumber(input.price) ?? 0,
      stock: readWholeNumber(input.stock) ?? 0,
      stockTracked: typeof input.stockTracked === "boolean" ? input.stockTracked : true,
      image: readImage(input.image),
    });
  }

  /**
   * Applies only the fields that parse. A blank name keeps the current one;
   * negative numbers clamp to 0.
   */
  async updateSnack(
    principal: Principal | undefined,
    snackId: string,
    input: SnackInput
  ): Promise<SnackRecord> {
    assertOwner(principal);
    const patch: SnackPatch = {};

    const name = readName(input.name);
    if (name) {
      patch.name = name;
    }
    const price = readWholeNumber(input.price);
    if (price !== null) {
      patch.price = price;
    }
    const stock = readWholeNumber(input.stock);
    if (stock !== null) {
      patch.stock = stock;
    }
    if (typeof input.stockTracked === "boolean") {
      patch.stockTracked = input.stockTracked;
    }
    if (input.image !== undefined) {
      patch.image = readImage(input.image);
    }

    const snack = await this.store.updateSnack(snackId, patch);
    if (!snack) {
      throw new NotFoundError("Snack not found");
    }
    return snack;
  }

  async deleteSnack(principal: Principal | undefined, snackId: string): Promise<void> {
    assertOwner(principal);
    if (!(await this.store.deleteSnack(snackId))) {
      throw new NotFoundError("Snack not found");
    }
  }
}
