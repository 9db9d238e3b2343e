import { describe, it, expect, beforeEach } from "vitest";
import { ResearchLedger } from "../src/services/ledger";
import {
  FUNDER_A,
  FUNDER_B,
  ManualClock,
  RESEARCHER,
  createTestLedger,
  createTestProject,
  registerTestResearcher,
  rejectionOf,
} from "./helpers";

describe("project lifecycle", () => {
  let ledger: ResearchLedger;
  let clock: ManualClock;

  beforeEach(async () => {
    ({ ledger, clock } = await createTestLedger());
  });

  describe("createProject", () => {
    it("refuses unregistered callers even with valid arguments", async () => {
      const error = await rejectionOf(createTestProject(ledger, 1000, "stranger"));

      expect(error.code).toBe("Unauthorized");
      expect(await ledger.getTotalProjects()).toBe(0);
    });

    it("opens an Active project with a deadline duration days out", async () => {
      await registerTestResearcher(ledger);

      const projectId = await createTestProject(ledger, 1000);
      const project = await ledger.getProject(projectId);

      expect(projectId).toBe(1);
      expect(project).toEqual({
        id: 1,
        researcher: RESEARCHER,
        title: "Soil microbiome survey",
        description: "Sequencing samples from ten sites",
        researchArea: "ecology",
        fundingGoal: 1000,
        currentFunding: 0,
        deadline: new Date("2026-01-31T00:00:00.000Z"),
        status: "Active",
        createdAt: new Date("2026-01-01T00:00:00.000Z"),
        plannedMilestones: ["Collect samples", "Sequence", "Publish"],
        contributorCount: 0,
      });
      expect((await ledger.getResearcher(RESEARCHER)).projectIds).toEqual([1]);
    });

    it("assigns sequential ids", async () => {
      await registerTestResearcher(ledger);

      expect(await createTestProject(ledger)).toBe(1);
      expect(await createTestProject(ledger)).toBe(2);
      expect(await ledger.getTotalProjects()).toBe(2);
      expect((await ledger.getResearcher(RESEARCHER)).projectIds).toEqual([1, 2]);
    });

    it("validates title, goal and duration", async () => {
      await registerTestResearcher(ledger);
      const base = {
        title: "Valid",
        description: "",
        researchArea: "",
        fundingGoal: 1000,
        durationDays: 30,
        plannedMilestones: [],
      };

      const failures = await Promise.all([
        rejectionOf(ledger.createProject(RESEARCHER, { ...base, title: "" })),
        rejectionOf(ledger.createProject(RESEARCHER, { ...base, fundingGoal: 0 })),
        rejectionOf(ledger.createProject(RESEARCHER, { ...base, fundingGoal: -5 })),
        rejectionOf(ledger.createProject(RESEARCHER, { ...base, fundingGoal: 1.5 })),
        rejectionOf(ledger.createProject(RESEARCHER, { ...base, durationDays: 0 })),
      ]);

      expect(failures.map((error) => error.code)).toEqual([
        "InvalidInput",
        "InvalidInput",
        "InvalidInput",
        "InvalidInput",
        "InvalidInput",
      ]);
      expect(await ledger.getTotalProjects()).toBe(0);
      expect((await ledger.getResearcher(RESEARCHER)).projectIds).toEqual([]);
    });
  });

  describe("fundProject", () => {
    let projectId: number;

    beforeEach(async () => {
      await registerTestResearcher(ledger);
      projectId = await createTestProject(ledger, 1000);
    });

    it("moves to Funded once the goal is reached and keeps the overshoot", async () => {
      const first = await ledger.fundProject(FUNDER_A, projectId, 600);
      expect(first).toEqual({ projectId, contributor: FUNDER_A, contribution: 600, currentFunding: 600, status: "Active" });

      const second = await ledger.fundProject(FUNDER_B, projectId, 500);
      expect(second).toEqual({ projectId, contributor: FUNDER_B, contribution: 500, currentFunding: 1100, status: "Funded" });

      const project = await ledger.getProject(projectId);
      expect(project.currentFunding).toBe(1100);
      expect(project.status).toBe("Funded");
      expect((await ledger.getPlatform()).poolBalance).toBe(1100);
    });

    it("accumulates repeat contributions under one contributor entry", async () => {
      await ledger.fundProject(FUNDER_A, projectId, 100);
      await ledger.fundProject(FUNDER_B, projectId, 50);
      await ledger.fundProject(FUNDER_A, projectId, 25);

      expect(await ledger.getProjectContributors(projectId)).toEqual([FUNDER_A, FUNDER_B]);
      expect(await ledger.getContribution(projectId, FUNDER_A)).toBe(125);
      expect(await ledger.getContribution(projectId, FUNDER_B)).toBe(50);
      expect(await ledger.getContribution(projectId, "nobody")).toBe(0);
    });

    it("keeps current funding equal to the sum of contributions", async () => {
      const funders = ["f1", "f2", "f3", "f1", "f4", "f2", "f5"];
      const amounts = [10, 20, 30, 40, 50, 60, 70];
      for (const [index, funder] of funders.entries()) {
        await ledger.fundProject(funder, projectId, amounts[index]);
      }

      const contributors = await ledger.getProjectContributors(projectId);
      const contributions = await Promise.all(contributors.map((c) => ledger.getContribution(projectId, c)));
      const project = await ledger.getProject(projectId);

      expect(contributors).toEqual(["f1", "f2", "f3", "f4", "f5"]);
      expect(contributions).toEqual([50, 80, 30, 50, 70]);
      expect(contributions.every((amount) => amount > 0)).toBe(true);
      expect(project.currentFunding).toBe(280);
      expect(project.contributorCount).toBe(5);
    });

    it("refuses funding once the project is Funded", async () => {
      await ledger.fundProject(FUNDER_A, projectId, 1000);

      const error = await rejectionOf(ledger.fundProject(FUNDER_B, projectId, 10));

      expect(error.code).toBe("InvalidState");
      expect((await ledger.getProject(projectId)).currentFunding).toBe(1000);
      expect(await ledger.getContribution(projectId, FUNDER_B)).toBe(0);
    });

    it("refuses funding at or after the deadline", async () => {
      clock.advanceDays(30);

      const error = await rejectionOf(ledger.fundProject(FUNDER_A, projectId, 10));

      expect(error.code).toBe("InvalidState");
      expect((await ledger.getProject(projectId)).currentFunding).toBe(0);
      expect(await ledger.getProjectContributors(projectId)).toEqual([]);
    });

    it("accepts funding just before the deadline", async () => {
      clock.advanceDays(29);

      const receipt = await ledger.fundProject(FUNDER_A, projectId, 10);

      expect(receipt.currentFunding).toBe(10);
    });

    it("rejects non-positive or fractional amounts", async () => {
      expect((await rejectionOf(ledger.fundProject(FUNDER_A, projectId, 0))).code).toBe("InvalidInput");
      expect((await rejectionOf(ledger.fundProject(FUNDER_A, projectId, -1))).code).toBe("InvalidInput");
      expect((await rejectionOf(ledger.fundProject(FUNDER_A, projectId, 0.5))).code).toBe("InvalidInput");
      expect(await ledger.getProjectContributors(projectId)).toEqual([]);
    });

    it("reports unknown projects as not found", async () => {
      expect((await rejectionOf(ledger.fundProject(FUNDER_A, 0, 10))).code).toBe("NotFound");
      expect((await rejectionOf(ledger.fundProject(FUNDER_A, 2, 10))).code).toBe("NotFound");
      expect((await rejectionOf(ledger.getContribution(2, FUNDER_A))).code).toBe("NotFound");
      expect((await rejectionOf(ledger.getProjectContributors(2))).code).toBe("NotFound");
      expect((await rejectionOf(ledger.getProject(2))).code).toBe("NotFound");
    });
  });
});
