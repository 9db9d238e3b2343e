import "./env";
import mongoose from "mongoose";
import { setTimeout as delay } from "timers/promises";
import { createApp } from "./app";
import { getConfig } from "./config";
import { LedgerStore } from "./ledger/store";
import { MemoryLedgerStore } from "./ledger/memoryStore";
import { MongoLedgerStore } from "./ledger/mongoStore";
import { ResearchLedger } from "./services/ledger";
import { logError, logInfo, logWarn } from "./utils/logger";

const config = getConfig();

logInfo("Loaded configuration in index.ts:", {
  PORT: config.PORT,
  LEDGER_BACKEND: config.LEDGER_BACKEND,
  MONGO_URI: config.LEDGER_BACKEND === "mongo" ? config.MONGO_URI : undefined,
  FRONTEND_URL: config.FRONTEND_URL || "(any origin)",
  PLATFORM_OWNER: config.PLATFORM_OWNER,
  FEE_RECIPIENT: config.FEE_RECIPIENT,
  PLATFORM_FEE_BPS: config.PLATFORM_FEE_BPS,
  INITIAL_VERIFIERS: config.INITIAL_VERIFIERS,
  API_KEY: "[hidden]",
});

// MongoDB connection with limited retries
const MAX_RETRIES = 5;
const RETRY_DELAY_MS = 5000;

const connectDB = async (): Promise<void> => {
  for (let attempt = 1; ; attempt++) {
    try {
      await mongoose.connect(config.MONGO_URI, {
        serverSelectionTimeoutMS: 5000, // Timeout after 5s if no server found
        connectTimeoutMS: 10000,
        maxPoolSize: 10,
        retryWrites: true,
        writeConcern: { w: "majority" },
        bufferCommands: false, // Fail fast instead of queueing commands while disconnected
      });
      logInfo("MongoDB connected successfully");
      return;
    } catch (err) {
      logError("MongoDB connection error:", err);
      if (attempt >= MAX_RETRIES) {
        throw new Error(`MongoDB unreachable after ${MAX_RETRIES} attempts`);
      }
      logInfo(`Retrying connection (${attempt}/${MAX_RETRIES}) in ${RETRY_DELAY_MS / 1000} seconds...`);
      await delay(RETRY_DELAY_MS);
    }
  }
};

mongoose.connection.on("connected", () => {
  logInfo("Mongoose connection established");
});

mongoose.connection.on("disconnected", () => {
  logWarn("MongoDB disconnected");
});

mongoose.connection.on("error", (err) => {
  logError("MongoDB connection error event:", err);
});

const createStore = async (): Promise<LedgerStore> => {
  if (config.LEDGER_BACKEND === "memory") {
    logWarn("Using the in-memory ledger; state is lost on restart");
    return new MemoryLedgerStore();
  }
  await connectDB();
  return new MongoLedgerStore();
};

const main = async (): Promise<void> => {
  const store = await createStore();
  const initialized = await store.initialize({
    owner: config.PLATFORM_OWNER,
    feeRecipient: config.FEE_RECIPIENT,
    feeBps: config.PLATFORM_FEE_BPS,
    verifiers: config.INITIAL_VERIFIERS,
  });
  logInfo(initialized ? "Ledger initialized" : "Ledger already initialized; keeping stored platform parameters");

  const ledger = new ResearchLedger({ store });
  const app = createApp({
    ledger,
    apiKey: config.API_KEY,
    frontendUrl: config.FRONTEND_URL,
    rateLimitMax: config.RATE_LIMIT_MAX,
  });

  const server = app.listen(config.PORT, () =>
    logInfo(`Server running on port ${config.PORT} (ledger backend: ${config.LEDGER_BACKEND})`)
  );

  // Graceful shutdown
  const gracefulShutdown = async () => {
    logInfo("Shutting down server...");
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (config.LEDGER_BACKEND === "mongo") {
      await mongoose.connection.close();
      logInfo("MongoDB connection closed");
    }
    process.exit(0);
  };
  const onSignal = () => {
    gracefulShutdown().catch((error) => {
      logError("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

process.on("unhandledRejection", (reason) => {
  logError("Unhandled Rejection:", reason);
});

main().catch((error) => {
  logError("Server failed to start", error);
  process.exit(1);
});
