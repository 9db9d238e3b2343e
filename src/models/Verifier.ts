import mongoose, { Schema } from "mongoose";

const VerifierSchema = new Schema(
  {
    principal: { type: String, required: true, unique: true },
    enabled: { type: Boolean, default: false },
  },
  { timestamps: true }
);

export default mongoose.model("Verifier", VerifierSchema);
