import type { NextFunction, Request, Response } from "express";
import type { InventoryService } from "../services/inventoryService";

export const createSnackController = (inventory: InventoryService) => {
  const getSnacks = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const snacks = await inventory.listSnacks();
      res.json({ success: true, snacks });
    } catch (error) {
      next(error);
    }
  };

  const getSnack = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const snack = await inventory.getSnack(req.params.snackId);
      res.json({ success: true, snack });
    } catch (error) {
      next(error);
    }
  };

  return { getSnacks, getSnack };
};
