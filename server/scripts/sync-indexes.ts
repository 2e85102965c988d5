import "dotenv/config";
import mongoose from "mongoose";

import { closeMongo, connectMongo } from "../src/config/db.js";
import { logger } from "../src/config/logger.js";
// ensure models are registered
import "../src/modules/listings/model.js";
import "../src/modules/locks/model.js";
import "../src/modules/bookings/model.js";
import "../src/modules/payments/model.js";
import "../src/modules/reviews/model.js";

const MODELS = ["Listing", "BookingLock", "Booking", "Payment", "Review"] as const;

async function main() {
  await connectMongo();

  for (const modelName of MODELS) {
    const m = mongoose.model(modelName);
    // creates the collection if needed, drops indexes no longer declared
    const dropped = await m.syncIndexes();
    const idx = await m.collection.indexes();
    logger.info("indexes.synced", {
      model: m.modelName,
      dropped,
      indexes: idx.map((i) => i.name),
    });
  }

  await closeMongo();
}

main().catch(async (err) => {
  logger.error("indexes.failed", { message: err instanceof Error ? err.message : String(err) });
  await closeMongo();
  process.exit(1);
});
