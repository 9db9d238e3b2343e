import mongoose, { Schema } from "mongoose";
import { PROJECT_STATUSES } from "../ledger/types";

const ContributionSchema = new Schema(
  {
    contributor: { type: String, required: true },
    amount: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const ProjectSchema = new Schema({
  projectId: { type: Number, required: true, unique: true },
  researcher: { type: String, required: true, index: true },
  title: { type: String, required: true },
  description: { type: String, default: "" },
  researchArea: { type: String, default: "" },
  fundingGoal: { type: Number, required: true, min: 1 },
  currentFunding: { type: Number, required: true, default: 0 },
  deadline: { type: Date, required: true },
  status: { type: String, enum: PROJECT_STATUSES, required: true, default: "Active" },
  createdAt: { type: Date, required: true },
  plannedMilestones: { type: [String], default: [] }, // informational, not linked to Milestone documents
  contributions: { type: [ContributionSchema], default: [] }, // insertion order is contributor order
});

export default mongoose.model("Project", ProjectSchema);
