import { LedgerSession } from "../ledger/store";
import { MilestoneInput, MilestoneRecord, MilestoneView, PayoutReceipt, Principal } from "../ledger/types";
import { InvalidStateError, NotFoundError, UnauthorizedError } from "../utils/errors";
import { requireAmount, requireText } from "../utils/validation";
import { releaseMilestoneFunds } from "./escrow";
import { recordEvent } from "./events";
import { requireVerifier } from "./platform";
import { loadProject } from "./projectLifecycle";
import { TransferSink } from "./transfers";

export async function loadMilestone(session: LedgerSession, milestoneId: number): Promise<MilestoneRecord> {
  const milestone = await session.findMilestone(milestoneId);
  if (!milestone) {
    throw new NotFoundError(`Milestone ${milestoneId} does not exist`);
  }
  return milestone;
}

export async function listProjectMilestones(session: LedgerSession, projectId: number): Promise<MilestoneView[]> {
  await loadProject(session, projectId);
  return session.listMilestones(projectId);
}

/**
 * Opens a milestone on a Funded or InProgress project. The requested amount is
 * not checked against what the project raised.
 */
export async function createMilestone(
  session: LedgerSession,
  caller: Principal,
  input: MilestoneInput,
  now: Date
): Promise<number> {
  const project = await loadProject(session, input.projectId);
  if (project.researcher !== caller) {
    throw new UnauthorizedError(`Caller ${caller} is not the researcher of project ${project.id}`);
  }
  if (project.status !== "Funded" && project.status !== "InProgress") {
    throw new InvalidStateError(`Project ${project.id} is ${project.status}; milestones need a Funded or InProgress project`);
  }
  requireText(input.description, "description");
  requireAmount(input.fundingAmount, "fundingAmount");

  const id = await session.nextId("milestone");
  await session.saveMilestone({
    id,
    projectId: project.id,
    description: input.description,
    fundingAmount: input.fundingAmount,
    completed: false,
    verified: false,
    completedAt: null,
    evidence: "",
  });
  await recordEvent(session, "MilestoneCreated", now, {
    principal: caller,
    projectId: project.id,
    milestoneId: id,
    amount: input.fundingAmount,
  });
  return id;
}

export async function completeMilestone(
  session: LedgerSession,
  caller: Principal,
  milestoneId: number,
  evidence: string,
  now: Date
): Promise<MilestoneView> {
  const milestone = await loadMilestone(session, milestoneId);
  const project = await loadProject(session, milestone.projectId);
  if (project.researcher !== caller) {
    throw new UnauthorizedError(`Caller ${caller} is not the researcher of project ${project.id}`);
  }
  if (milestone.completed) {
    throw new InvalidStateError(`Milestone ${milestoneId} is already completed`);
  }
  requireText(evidence, "evidence");

  milestone.completed = true;
  milestone.completedAt = now;
  milestone.evidence = evidence;
  await session.saveMilestone(milestone);
  await recordEvent(session, "MilestoneCompleted", now, {
    principal: caller,
    projectId: project.id,
    milestoneId,
    details: { evidence },
  });

  // First completion on a Funded project marks work as started.
  if (project.status === "Funded") {
    project.status = "InProgress";
    await session.saveProject(project);
    await recordEvent(session, "ProjectStatusChanged", now, {
      projectId: project.id,
      details: { from: "Funded", to: "InProgress" },
    });
  }
  return milestone;
}

/**
 * Attests a completed milestone and releases its funds in the same unit of
 * work. `verified` is persisted before any transfer so a repeated or
 * reentrant call sees it and is refused.
 */
export async function verifyMilestone(
  session: LedgerSession,
  transfers: TransferSink,
  caller: Principal,
  milestoneId: number,
  now: Date
): Promise<PayoutReceipt> {
  await requireVerifier(session, caller);
  const milestone = await loadMilestone(session, milestoneId);
  if (!milestone.completed) {
    throw new InvalidStateError(`Milestone ${milestoneId} has not been completed`);
  }
  if (milestone.verified) {
    throw new InvalidStateError(`Milestone ${milestoneId} is already verified`);
  }

  milestone.verified = true;
  await session.saveMilestone(milestone);
  await recordEvent(session, "MilestoneVerified", now, {
    principal: caller,
    projectId: milestone.projectId,
    milestoneId,
  });

  return releaseMilestoneFunds(session, transfers, milestone, now);
}
