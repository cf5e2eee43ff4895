import { describe, expect, it } from "vitest";
import { readWholeNumber, SEED_STOCK } from "../src/services/inventoryService";
import { NotFoundError, ValidationFailure } from "../src/utils/errors";
import { addCustomer, addSnack, createWorld, owner } from "./support/fixtures";

describe("readWholeNumber", () => {
  it("reads whole numbers and clamps negatives to 0", () => {
    expect(readWholeNumber("12")).toBe(12);
    expect(readWholeNumber(7)).toBe(7);
    expect(readWholeNumber("-4")).toBe(0);
  });

  it("returns null for anything that is not a whole number", () => {
    expect(readWholeNumber("1.5")).toBeNull();
    expect(readWholeNumber(2.5)).toBeNull();
    expect(readWholeNumber("")).toBeNull();
    expect(readWholeNumber("ten")).toBeNull();
    expect(readWholeNumber(null)).toBeNull();
  });
});

describe("InventoryService", () => {
  it("seeds the default menu once", async () => {
    const { services } = createWorld();

    expect(await services.inventory.seedSnacksIfEmpty()).toBe(24);
    expect(await services.inventory.seedSnacksIfEmpty()).toBe(0);

    const snacks = await services.inventory.listSnacks();
    expect(snacks).toHaveLength(24);
    expect(snacks[0]).toMatchObject({
      name: "Vada Pav",
      price: 20,
      stock: SEED_STOCK,
      stockTracked: true,
      image: "vada-pav.jpg",
    });
    expect(snacks[23].name).toBe("Coffee");
  });

  it("adds each snack once when two seeds overlap", async () => {
    const { store, services } = createWorld();

    const [first, second] = await Promise.all([
      services.inventory.seedSnacksIfEmpty(),
      services.inventory.seedSnacksIfEmpty(),
    ]);

    expect(first + second).toBe(24);
    expect(store.data.snacks).toHaveLength(24);
    expect(new Set(store.data.snacks.map((s) => s.name)).size).toBe(24);
  });

  it("does not seed a catalog that already has snacks", async () => {
    const { store, services } = createWorld();
    await addSnack(store, "Samosa", 20, 5);

    expect(await services.inventory.seedSnacksIfEmpty()).toBe(0);
    expect(store.data.snacks).toHaveLength(1);
  });

  it("adds snacks with clamped numbers", async () => {
    const { services } = createWorld();

    const snack = await services.inventory.addSnack(owner, {
      name: "  Kanda Bhaji ",
      price: "-5",
      stock: "abc",
    });

    expect(snack).toMatchObject({
      name: "Kanda Bhaji",
      price: 0,
      stock: 0,
      stockTracked: true,
      image: null,
    });
  });

  it("requires a name", async () => {
    const { services } = createWorld();

    await expect(services.inventory.addSnack(owner, { name: " ", price: 10 })).rejects.toThrow(
      new ValidationFailure("Snack name is required.")
    );
  });

  it("updates only the fields that parse", async () => {
    const { store, services } = createWorld();
    const samosa = await addSnack(store, "Samosa", 20, 5);

    const updated = await services.inventory.updateSnack(owner, samosa.id, {
      name: "",
      price: "abc",
      stock: "-3",
      stockTracked: false,
    });

    expect(updated).toMatchObject({ name: "Samosa", price: 20, stock: 0, stockTracked: false });
  });

  it("reports unknown snacks", async () => {
    const { services } = createWorld();

    await expect(services.inventory.getSnack("nope")).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      services.inventory.updateSnack(owner, "nope", { price: 10 })
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.inventory.deleteSnack(owner, "nope")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("deletes snacks for the owner only", async () => {
    const { store, services } = createWorld();
    const customer = await addCustomer(store);
    const samosa = await addSnack(store, "Samosa", 20, 5);

    await expect(services.inventory.deleteSnack(customer, samosa.id)).rejects.toMatchObject({
      statusCode: 403,
    });
    await services.inventory.deleteSnack(owner, samosa.id);
    expect(store.data.snacks).toHaveLength(0);
  });
});
