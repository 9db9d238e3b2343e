import "../env";
import mongoose from "mongoose";
import { getConfig } from "../config";
import { MongoLedgerStore } from "../ledger/mongoStore";
import { ResearchLedger } from "../services/ledger";
import { logError, logInfo } from "../utils/logger";

// Creates the platform document and trusts the configured verifiers on an
// empty database. Safe to re-run: an initialized ledger is left as it is.
async function initializeLedger() {
  const config = getConfig();
  await mongoose.connect(config.MONGO_URI);

  const store = new MongoLedgerStore();
  const created = await store.initialize({
    owner: config.PLATFORM_OWNER,
    feeRecipient: config.FEE_RECIPIENT,
    feeBps: config.PLATFORM_FEE_BPS,
    verifiers: config.INITIAL_VERIFIERS,
  });
  logInfo(created ? "Platform parameters created" : "Platform parameters already present");

  if (!created) {
    // after the first run the verifier set only changes through setVerifier
    logInfo("Skipping INITIAL_VERIFIERS; use PUT /api/platform/verifiers/:principal to change the verifier set");
  }

  const ledger = new ResearchLedger({ store });
  const platform = await ledger.getPlatform();
  logInfo("Ledger state", platform);
  await mongoose.disconnect();
  logInfo("Migration complete");
}

initializeLedger().catch(async (error) => {
  logError("Migration failed", error);
  await mongoose.disconnect();
  process.exitCode = 1;
});
