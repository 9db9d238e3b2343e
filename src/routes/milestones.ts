import express, { Router } from "express";
import { callerOf } from "../middleware/auth";
import { ResearchLedger } from "../services/ledger";
import { asyncHandler } from "../utils/asyncHandler";
import { asPayload, parseId, readNumber, readString } from "../utils/validation";

export default function milestoneRoutes(ledger: ResearchLedger): Router {
  const router = express.Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const payload = asPayload(req.body);
      const milestoneId = await ledger.createMilestone(caller, {
        projectId: readNumber(payload, "projectId"),
        description: readString(payload, "description"),
        fundingAmount: readNumber(payload, "fundingAmount"),
      });
      res.status(201).json({ milestoneId });
    })
  );

  router.get(
    "/count",
    asyncHandler(async (req, res) => {
      res.status(200).json({ total: await ledger.getTotalMilestones() });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const milestone = await ledger.getMilestone(parseId(req.params.id, "Milestone"));
      res.status(200).json(milestone);
    })
  );

  router.post(
    "/:id/complete",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const milestoneId = parseId(req.params.id, "Milestone");
      const payload = asPayload(req.body);
      const milestone = await ledger.completeMilestone(caller, milestoneId, readString(payload, "evidence"));
      res.status(200).json(milestone);
    })
  );

  // Verification releases the milestone's funds; a second call is refused, never paid twice
  router.post(
    "/:id/verify",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const receipt = await ledger.verifyMilestone(caller, parseId(req.params.id, "Milestone"));
      res.status(200).json(receipt);
    })
  );

  return router;
}
