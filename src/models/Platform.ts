import mongoose, { Schema } from "mongoose";

export const PLATFORM_KEY = "platform";

// Singleton document holding the platform parameters and the pooled escrow balance.
const PlatformSchema = new Schema(
  {
    key: { type: String, required: true, unique: true, default: PLATFORM_KEY },
    owner: { type: String, required: true },
    feeBps: { type: Number, required: true, min: 0, max: 1000 },
    feeRecipient: { type: String, required: true },
    poolBalance: { type: Number, required: true, default: 0, min: 0 },
  },
  { timestamps: true }
);

export default mongoose.model("Platform", PlatformSchema);
