import express from "express";
import { createSnackController } from "../controllers/snacks";
import type { InventoryService } from "../services/inventoryService";

export const createSnackRoutes = (inventory: InventoryService) => {
  const { getSnacks, getSnack } = createSnackController(inventory);
  const router = express.Router();

  router.get("/", getSnacks);
  router.get("/:snackId", getSnack);

  return router;
};
