import mongoose, { Schema } from "mongoose";
import { SEQUENCES } from "../ledger/types";

const CounterSchema = new Schema({
  name: { type: String, enum: SEQUENCES, required: true, unique: true },
  value: { type: Number, required: true, default: 0 },
});

export default mongoose.model("Counter", CounterSchema);
