import { LedgerSession } from "../ledger/store";
import { FundingReceipt, Principal, ProjectInput, ProjectRecord, ProjectView } from "../ledger/types";
import { InvalidInputError, InvalidStateError, NotFoundError } from "../utils/errors";
import { requireAmount, requireSum, requireText } from "../utils/validation";
import { recordEvent } from "./events";
import { requireRegisteredResearcher } from "./researcherRegistry";

const DAY_MS = 24 * 60 * 60 * 1000;

export async function loadProject(session: LedgerSession, projectId: number): Promise<ProjectRecord> {
  const project = await session.findProject(projectId);
  if (!project) {
    throw new NotFoundError(`Project ${projectId} does not exist`);
  }
  return project;
}

export const contributorsOf = (project: ProjectRecord): Principal[] =>
  project.contributions.map(({ contributor }) => contributor);

export const contributionOf = (project: ProjectRecord, principal: Principal): number =>
  project.contributions.find(({ contributor }) => contributor === principal)?.amount ?? 0;

export const toProjectView = (project: ProjectRecord): ProjectView => ({
  id: project.id,
  researcher: project.researcher,
  title: project.title,
  description: project.description,
  researchArea: project.researchArea,
  fundingGoal: project.fundingGoal,
  currentFunding: project.currentFunding,
  deadline: project.deadline,
  status: project.status,
  createdAt: project.createdAt,
  plannedMilestones: [...project.plannedMilestones],
  contributorCount: project.contributions.length,
});

export async function createProject(
  session: LedgerSession,
  caller: Principal,
  input: ProjectInput,
  now: Date
): Promise<number> {
  const researcher = await requireRegisteredResearcher(session, caller);

  requireText(input.title, "title");
  requireAmount(input.fundingGoal, "fundingGoal");
  if (!Number.isSafeInteger(input.durationDays) || input.durationDays <= 0) {
    throw new InvalidInputError("durationDays must be a positive whole number of days");
  }
  const deadline = new Date(now.getTime() + input.durationDays * DAY_MS);
  if (Number.isNaN(deadline.getTime())) {
    throw new InvalidInputError("durationDays puts the deadline past the representable date range");
  }

  const id = await session.nextId("project");
  const project: ProjectRecord = {
    id,
    researcher: caller,
    title: input.title,
    description: input.description,
    researchArea: input.researchArea,
    fundingGoal: input.fundingGoal,
    currentFunding: 0,
    deadline,
    status: "Active",
    createdAt: now,
    plannedMilestones: [...input.plannedMilestones],
    contributions: [],
  };
  await session.saveProject(project);

  researcher.projectIds.push(id);
  await session.saveResearcher(researcher);

  await recordEvent(session, "ProjectCreated", now, {
    principal: caller,
    projectId: id,
    amount: input.fundingGoal,
    details: { title: input.title, deadline: deadline.toISOString() },
  });
  return id;
}

/**
 * Adds a contribution to an Active project. The full amount is accepted even
 * when it overshoots the goal; reaching the goal moves the project to Funded,
 * after which further contributions are refused.
 */
export async function fundProject(
  session: LedgerSession,
  caller: Principal,
  projectId: number,
  amount: number,
  now: Date
): Promise<FundingReceipt> {
  const project = await loadProject(session, projectId);
  requireAmount(amount, "amount");

  if (project.status !== "Active") {
    throw new InvalidStateError(`Project ${projectId} is ${project.status} and no longer accepts funding`);
  }
  if (now.getTime() >= project.deadline.getTime()) {
    throw new InvalidStateError(`Project ${projectId} passed its funding deadline`);
  }
  if (project.currentFunding >= project.fundingGoal) {
    throw new InvalidStateError(`Project ${projectId} already reached its funding goal`);
  }

  const platform = await session.getPlatform();
  const currentFunding = requireSum(project.currentFunding, amount, "currentFunding");
  const poolBalance = requireSum(platform.poolBalance, amount, "poolBalance");

  const entry = project.contributions.find(({ contributor }) => contributor === caller);
  if (entry) {
    entry.amount = requireSum(entry.amount, amount, "contribution");
  } else {
    project.contributions.push({ contributor: caller, amount });
  }
  project.currentFunding = currentFunding;

  const reachedGoal = project.currentFunding >= project.fundingGoal;
  if (reachedGoal) {
    project.status = "Funded";
  }

  await session.saveProject(project);
  await session.savePlatform({ ...platform, poolBalance });

  await recordEvent(session, "ProjectFunded", now, {
    principal: caller,
    projectId,
    amount,
    details: { currentFunding: project.currentFunding },
  });
  if (reachedGoal) {
    await recordEvent(session, "ProjectStatusChanged", now, {
      projectId,
      details: { from: "Active", to: "Funded" },
    });
  }

  return {
    projectId,
    contributor: caller,
    contribution: contributionOf(project, caller),
    currentFunding: project.currentFunding,
    status: project.status,
  };
}
