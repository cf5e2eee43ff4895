import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import connectDB from "./config/database";
import { MongoShopStore } from "./store/mongoShopStore";

dotenv.config();

// Start server after the database connection is established
const startServer = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectDB(config);

    const { app, services } = createApp({ config, store: new MongoShopStore() });
    await services.inventory.seedSnacksIfEmpty();

    const merged = await services.carts.mergeDuplicateCarts();
    if (merged > 0) {
      console.warn(`🛒 Merged duplicate carts for ${merged} customer(s)`);
    }

    app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
