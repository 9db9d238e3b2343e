import mongoose, { Schema } from "mongoose";
import { LEDGER_EVENT_TYPES } from "../ledger/types";

const LedgerEventSchema = new Schema({
  seq: { type: Number, required: true, unique: true },
  type: { type: String, enum: LEDGER_EVENT_TYPES, required: true },
  at: { type: Date, required: true },
  principal: { type: String, default: null },
  projectId: { type: Number, default: null, index: true },
  milestoneId: { type: Number, default: null, index: true },
  amount: { type: Number, default: null },
  details: { type: Schema.Types.Mixed, default: {} },
});

export default mongoose.model("LedgerEvent", LedgerEventSchema);
