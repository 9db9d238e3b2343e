import { describe, it, expect, beforeEach } from "vitest";
import { ResearchLedger } from "../src/services/ledger";
import {
  FEE_RECIPIENT,
  FUNDER_A,
  FUNDER_B,
  OWNER,
  RESEARCHER,
  VERIFIER,
  createFundedProject,
  createTestLedger,
  createTestProject,
  registerTestResearcher,
  rejectionOf,
} from "./helpers";

describe("platform administration", () => {
  let ledger: ResearchLedger;

  beforeEach(async () => {
    ({ ledger } = await createTestLedger());
  });

  it("starts from the initialization parameters", async () => {
    expect(await ledger.getPlatform()).toEqual({
      owner: OWNER,
      feeBps: 250,
      feeRecipient: FEE_RECIPIENT,
      poolBalance: 0,
      totalProjects: 0,
      totalMilestones: 0,
    });
    expect(await ledger.isVerifier(OWNER)).toBe(true);
    expect(await ledger.isVerifier(VERIFIER)).toBe(true);
    expect(await ledger.isVerifier(RESEARCHER)).toBe(false);
  });

  describe("setPlatformFee", () => {
    it("caps the fee at 1000 basis points", async () => {
      expect((await rejectionOf(ledger.setPlatformFee(OWNER, 1001))).code).toBe("LimitExceeded");
      expect((await ledger.getPlatform()).feeBps).toBe(250);

      await ledger.setPlatformFee(OWNER, 1000);
      expect((await ledger.getPlatform()).feeBps).toBe(1000);
    });

    it("rejects negative or fractional rates", async () => {
      expect((await rejectionOf(ledger.setPlatformFee(OWNER, -1))).code).toBe("InvalidInput");
      expect((await rejectionOf(ledger.setPlatformFee(OWNER, 2.5))).code).toBe("InvalidInput");
    });

    it("is owner only", async () => {
      expect((await rejectionOf(ledger.setPlatformFee(VERIFIER, 100))).code).toBe("Unauthorized");
    });

    it("applies the new rate to later payouts", async () => {
      await registerTestResearcher(ledger);
      const projectId = await createFundedProject(ledger);
      const milestoneId = await ledger.createMilestone(RESEARCHER, { projectId, description: "Collect", fundingAmount: 400 });
      await ledger.completeMilestone(RESEARCHER, milestoneId, "ipfs://evidence");
      await ledger.setPlatformFee(OWNER, 1000);

      const receipt = await ledger.verifyMilestone(VERIFIER, milestoneId);

      expect(receipt).toMatchObject({ researcherShare: 360, fee: 40 });
    });
  });

  it("routes fees to a newly configured recipient", async () => {
    await registerTestResearcher(ledger);
    const projectId = await createFundedProject(ledger);
    const milestoneId = await ledger.createMilestone(RESEARCHER, { projectId, description: "Collect", fundingAmount: 400 });
    await ledger.completeMilestone(RESEARCHER, milestoneId, "ipfs://evidence");

    await ledger.setFeeRecipient(OWNER, "new-treasury");
    await ledger.verifyMilestone(VERIFIER, milestoneId);

    expect(await ledger.getAccountBalance("new-treasury")).toBe(10);
    expect(await ledger.getAccountBalance(FEE_RECIPIENT)).toBe(0);
    expect((await rejectionOf(ledger.setFeeRecipient(RESEARCHER, RESEARCHER))).code).toBe("Unauthorized");
    expect((await rejectionOf(ledger.setFeeRecipient(OWNER, ""))).code).toBe("InvalidInput");
  });

  it("lets only the owner manage verifiers", async () => {
    expect((await rejectionOf(ledger.setVerifier(VERIFIER, "verifier-two", true))).code).toBe("Unauthorized");

    await ledger.setVerifier(OWNER, "verifier-two", true);

    expect(await ledger.isVerifier("verifier-two")).toBe(true);
  });

  it("records every state change as an ordered event", async () => {
    await registerTestResearcher(ledger);
    const projectId = await createTestProject(ledger, 1000);
    await ledger.fundProject(FUNDER_A, projectId, 600);
    await ledger.fundProject(FUNDER_B, projectId, 500);
    const milestoneId = await ledger.createMilestone(RESEARCHER, { projectId, description: "Collect", fundingAmount: 400 });
    await ledger.completeMilestone(RESEARCHER, milestoneId, "ipfs://evidence");
    await ledger.verifyMilestone(VERIFIER, milestoneId);

    const events = await ledger.getEvents();

    expect(events.map((event) => [event.seq, event.type])).toEqual([
      [1, "ResearcherRegistered"],
      [2, "ProjectCreated"],
      [3, "ProjectFunded"],
      [4, "ProjectFunded"],
      [5, "ProjectStatusChanged"],
      [6, "MilestoneCreated"],
      [7, "MilestoneCompleted"],
      [8, "ProjectStatusChanged"],
      [9, "MilestoneVerified"],
      [10, "FundsReleased"],
    ]);
    expect(events[9]).toEqual({
      seq: 10,
      type: "FundsReleased",
      at: new Date("2026-01-01T00:00:00.000Z"),
      principal: RESEARCHER,
      projectId,
      milestoneId,
      amount: 400,
      details: { researcherShare: 390, fee: 10, feeRecipient: FEE_RECIPIENT, feeBps: 250 },
    });
    expect(await ledger.getEvents({ projectId })).toHaveLength(9);
  });
});
