import express, { Router } from "express";
import { callerOf } from "../middleware/auth";
import { ResearchLedger } from "../services/ledger";
import { asyncHandler } from "../utils/asyncHandler";
import { asPayload, parseId, readNumber, readString, readStringList } from "../utils/validation";

export default function projectRoutes(ledger: ResearchLedger): Router {
  const router = express.Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const payload = asPayload(req.body);
      const projectId = await ledger.createProject(caller, {
        title: readString(payload, "title"),
        description: readString(payload, "description", ""),
        researchArea: readString(payload, "researchArea", ""),
        fundingGoal: readNumber(payload, "fundingGoal"),
        durationDays: readNumber(payload, "durationDays"),
        plannedMilestones: readStringList(payload, "plannedMilestones"),
      });
      res.status(201).json({ projectId });
    })
  );

  // Registered before /:id so "count" is not read as an id
  router.get(
    "/count",
    asyncHandler(async (req, res) => {
      res.status(200).json({ total: await ledger.getTotalProjects() });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const project = await ledger.getProject(parseId(req.params.id, "Project"));
      res.status(200).json(project);
    })
  );

  // The amount arrives out-of-band with the caller's payment; this records it
  router.post(
    "/:id/fund",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const projectId = parseId(req.params.id, "Project");
      const payload = asPayload(req.body);
      const receipt = await ledger.fundProject(caller, projectId, readNumber(payload, "amount"));
      res.status(200).json(receipt);
    })
  );

  router.get(
    "/:id/contributors",
    asyncHandler(async (req, res) => {
      const projectId = parseId(req.params.id, "Project");
      res.status(200).json({ projectId, contributors: await ledger.getProjectContributors(projectId) });
    })
  );

  router.get(
    "/:id/contributions/:principal",
    asyncHandler(async (req, res) => {
      const projectId = parseId(req.params.id, "Project");
      const { principal } = req.params;
      res.status(200).json({ projectId, principal, amount: await ledger.getContribution(projectId, principal) });
    })
  );

  router.get(
    "/:id/milestones",
    asyncHandler(async (req, res) => {
      const projectId = parseId(req.params.id, "Project");
      res.status(200).json({ projectId, milestones: await ledger.getProjectMilestones(projectId) });
    })
  );

  return router;
}
