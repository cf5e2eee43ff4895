import dotenv from "dotenv";
import { loadConfig } from "../config/env";
import connectDB, { disconnectDB } from "../config/database";
import { createServices } from "../services";
import { MongoShopStore } from "../store/mongoShopStore";
import { systemClock } from "../types";
import { ConflictError } from "./errors";

// Fills the default menu (only when the catalog is empty) and adds demo
// customers that do not exist yet. Safe to run more than once.

dotenv.config();

const DEMO_CUSTOMERS = [
  { name: "Demo Customer", email: "demo@example.com", mobile: "9876543210", password: "demo123" },
  { name: "Test Customer", email: "test@example.com", mobile: "9876543211", password: "test123" },
];

const seedDatabase = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectDB(config);
    const services = createServices(new MongoShopStore(), config, systemClock);

    const added = await services.inventory.seedSnacksIfEmpty();
    if (added === 0) {
      console.log("ℹ️  Snacks already present, catalog left as is");
    }

    console.log("Creating demo customers...");
    for (const demo of DEMO_CUSTOMERS) {
      try {
        await services.accounts.register(demo);
        console.log(`✅ Created customer: ${demo.email} / ${demo.password}`);
      } catch (error) {
        if (!(error instanceof ConflictError)) {
          throw error;
        }
        console.log(`ℹ️  ${demo.email} already registered`);
      }
    }

    console.log("\n🎉 Snack counter DB seeded successfully!");
    await disconnectDB();
    process.exit(0);
  } catch (error) {
    console.error("❌ Error seeding database:", error);
    process.exit(1);
  }
};

void seedDatabase();
