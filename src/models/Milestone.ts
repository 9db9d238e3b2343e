import mongoose, { Schema } from "mongoose";

const MilestoneSchema = new Schema({
  milestoneId: { type: Number, required: true, unique: true },
  projectId: { type: Number, required: true, index: true },
  description: { type: String, required: true },
  fundingAmount: { type: Number, required: true, min: 1 },
  completed: { type: Boolean, default: false },
  verified: { type: Boolean, default: false },
  completedAt: { type: Date, default: null },
  evidence: { type: String, default: "" }, // IPFS hash or other opaque reference
});

export default mongoose.model("Milestone", MilestoneSchema);
