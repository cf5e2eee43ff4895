import dotenv from "dotenv";
import { loadConfig } from "../config/env";
import connectDB, { disconnectDB } from "../config/database";
import { createServices } from "../services";
import { MongoShopStore } from "../store/mongoShopStore";
import { systemClock } from "../types";

// One-off backfill: folds every customer's extra carts into their oldest one
// so the unique index on carts.customer can be built.

dotenv.config();

const mergeCarts = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectDB(config);
    const { carts } = createServices(new MongoShopStore(), config, systemClock);

    const merged = await carts.mergeDuplicateCarts();
    console.log(`✅ Merged duplicate carts for ${merged} customer(s)`);

    await disconnectDB();
    process.exit(0);
  } catch (error) {
    console.error("❌ Error merging carts:", error);
    process.exit(1);
  }
};

void mergeCarts();
