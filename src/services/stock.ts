import type { SnackRecord } from "../types";

export interface StockRules {
  /**
   * Legacy reading of a tracked stock of 0 as "not limited". Catalogs
   * imported from the old counter app used 0 for snacks nobody counted.
   */
  zeroStockUnlimited: boolean;
}

/** Units of a snack that can still be sold, or null when sales are not limited. */
export const availableStock = (snack: SnackRecord, rules: StockRules): number | null => {
  if (!snack.stockTracked) {
    return null;
  }
  if (snack.stock === 0 && rules.zeroStockUnlimited) {
    return null;
  }
  return snack.stock;
};
