import mongoose from "mongoose";
import { ServerApiVersion } from "mongodb";
import type { AppConfig } from "./env";

// All collections live in one database. Checkout runs inside MongoDB
// transactions, so the server must be a replica set (a single-node
// replica set is enough for development).

const clientOptions = {
  serverApi: {
    version: ServerApiVersion.v1,
    strict: true,
    deprecationErrors: true,
  },
};

const connectDB = async (config: AppConfig): Promise<void> => {
  try {
    const conn = await mongoose.connect(config.mongoUri, {
      ...clientOptions,
      dbName: config.mongoDbName,
    });

    console.log(`✅ MongoDB Connected Successfully`);
    console.log(`   Host: ${conn.connection.host}`);
    console.log(`   Database: ${conn.connection.name}`);
  } catch (error) {
    console.error("❌ MongoDB connection error:", error);
    console.error("   Please check MONGODB_URI in your .env file");
    console.error(
      "   Format: mongodb://localhost:27017/?replicaSet=rs0 (transactions need a replica set)"
    );
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

export default connectDB;
