import express, { Router } from "express";
import { callerOf } from "../middleware/auth";
import { ResearchLedger } from "../services/ledger";
import { asyncHandler } from "../utils/asyncHandler";
import { asPayload, readString, readStringList } from "../utils/validation";

export default function researcherRoutes(ledger: ResearchLedger): Router {
  const router = express.Router();

  // Register, or overwrite the caller's profile (reputation resets to 100)
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const payload = asPayload(req.body);
      const researcher = await ledger.registerResearcher(caller, {
        name: readString(payload, "name"),
        institution: readString(payload, "institution"),
        expertise: readStringList(payload, "expertise"),
      });
      res.status(200).json(researcher);
    })
  );

  router.get(
    "/:principal",
    asyncHandler(async (req, res) => {
      const researcher = await ledger.getResearcher(req.params.principal);
      res.status(200).json(researcher);
    })
  );

  return router;
}
