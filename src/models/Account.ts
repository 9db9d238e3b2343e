import mongoose, { Schema } from "mongoose";

// Balances credited by milestone payouts, fees and emergency withdrawals.
const AccountSchema = new Schema(
  {
    principal: { type: String, required: true, unique: true },
    balance: { type: Number, required: true, default: 0, min: 0 },
  },
  { timestamps: true }
);

export default mongoose.model("Account", AccountSchema);
