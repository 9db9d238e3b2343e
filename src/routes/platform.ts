import express, { Router } from "express";
import { LEDGER_EVENT_TYPES, EventFilter } from "../ledger/types";
import { callerOf } from "../middleware/auth";
import { ResearchLedger } from "../services/ledger";
import { asyncHandler } from "../utils/asyncHandler";
import { InvalidInputError } from "../utils/errors";
import { asPayload, parseId, readBoolean, readNumber, readString } from "../utils/validation";

const queryString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

export default function platformRoutes(ledger: ResearchLedger): Router {
  const router = express.Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      res.status(200).json(await ledger.getPlatform());
    })
  );

  router.get(
    "/verifiers/:principal",
    asyncHandler(async (req, res) => {
      const { principal } = req.params;
      res.status(200).json({ principal, trusted: await ledger.isVerifier(principal) });
    })
  );

  router.put(
    "/verifiers/:principal",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const { principal } = req.params;
      const enabled = readBoolean(asPayload(req.body), "enabled");
      await ledger.setVerifier(caller, principal, enabled);
      res.status(200).json({ principal, trusted: enabled });
    })
  );

  router.put(
    "/fee",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const feeBps = readNumber(asPayload(req.body), "feeBps");
      await ledger.setPlatformFee(caller, feeBps);
      res.status(200).json({ feeBps });
    })
  );

  router.put(
    "/fee-recipient",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const feeRecipient = readString(asPayload(req.body), "feeRecipient");
      await ledger.setFeeRecipient(caller, feeRecipient);
      res.status(200).json({ feeRecipient });
    })
  );

  // Escape hatch: moves the whole pool to the owner, bypassing project accounting
  router.post(
    "/emergency-withdraw",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const amount = await ledger.emergencyWithdraw(caller);
      res.status(200).json({ withdrawn: amount });
    })
  );

  router.get(
    "/accounts/:principal",
    asyncHandler(async (req, res) => {
      const { principal } = req.params;
      res.status(200).json({ principal, balance: await ledger.getAccountBalance(principal) });
    })
  );

  router.get(
    "/events",
    asyncHandler(async (req, res) => {
      const filter: EventFilter = {};
      const projectId = queryString(req.query.projectId);
      const milestoneId = queryString(req.query.milestoneId);
      const type = queryString(req.query.type);
      if (projectId !== undefined) filter.projectId = parseId(projectId, "Project");
      if (milestoneId !== undefined) filter.milestoneId = parseId(milestoneId, "Milestone");
      if (type !== undefined) {
        const eventType = LEDGER_EVENT_TYPES.find((candidate) => candidate === type);
        if (!eventType) {
          throw new InvalidInputError(`Unknown event type: ${type}`);
        }
        filter.type = eventType;
      }
      res.status(200).json({ events: await ledger.getEvents(filter) });
    })
  );

  return router;
}
