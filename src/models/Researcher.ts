import mongoose, { Schema } from "mongoose";

const ResearcherSchema = new Schema(
  {
    principal: { type: String, required: true, unique: true },
    name: { type: String, required: true },
    institution: { type: String, required: true },
    expertise: { type: [String], default: [] },
    reputation: { type: Number, required: true, min: 0 },
    isVerified: { type: Boolean, default: false }, // set by an external review process only
    projectIds: { type: [Number], default: [] },
  },
  { timestamps: true }
);

export default mongoose.model("Researcher", ResearcherSchema);
