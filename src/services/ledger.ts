import { LedgerSession, LedgerStore } from "../ledger/store";
import {
  EventFilter,
  FundingReceipt,
  LedgerEvent,
  MilestoneInput,
  MilestoneView,
  PayoutReceipt,
  PlatformView,
  Principal,
  ProjectInput,
  ProjectView,
  ResearcherInput,
  ResearcherView,
} from "../ledger/types";
import { Clock, systemClock } from "../utils/clock";
import { LedgerError, errorMessage } from "../utils/errors";
import { logError, logInfo, logWarn } from "../utils/logger";
import { Serializer } from "../utils/serializer";
import { emergencyWithdraw } from "./escrow";
import { completeMilestone, createMilestone, listProjectMilestones, loadMilestone, verifyMilestone } from "./milestoneEngine";
import { getPlatformView, setFeeRecipient, setPlatformFee, setVerifier } from "./platform";
import { contributionOf, contributorsOf, createProject, fundProject, loadProject, toProjectView } from "./projectLifecycle";
import { getResearcher, registerResearcher } from "./researcherRegistry";
import { TransferSink, accountTransfers } from "./transfers";

export interface LedgerOptions {
  store: LedgerStore;
  clock?: Clock;
  transfers?: TransferSink;
}

/**
 * Boundary of the crowdfunding ledger. Every mutating call is queued behind
 * the previous one and runs as a single store transaction, so a failure at
 * any step leaves no trace. Views read committed state directly.
 */
export class ResearchLedger {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly transfers: TransferSink;
  private readonly serializer = new Serializer();

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.transfers = options.transfers ?? accountTransfers;
  }

  registerResearcher(caller: Principal, input: ResearcherInput): Promise<ResearcherView> {
    return this.mutate("registerResearcher", caller, (session, now) => registerResearcher(session, caller, input, now));
  }

  createProject(caller: Principal, input: ProjectInput): Promise<number> {
    return this.mutate("createProject", caller, (session, now) => createProject(session, caller, input, now));
  }

  fundProject(caller: Principal, projectId: number, amount: number): Promise<FundingReceipt> {
    return this.mutate("fundProject", caller, (session, now) => fundProject(session, caller, projectId, amount, now));
  }

  createMilestone(caller: Principal, input: MilestoneInput): Promise<number> {
    return this.mutate("createMilestone", caller, (session, now) => createMilestone(session, caller, input, now));
  }

  completeMilestone(caller: Principal, milestoneId: number, evidence: string): Promise<MilestoneView> {
    return this.mutate("completeMilestone", caller, (session, now) =>
      completeMilestone(session, caller, milestoneId, evidence, now)
    );
  }

  verifyMilestone(caller: Principal, milestoneId: number): Promise<PayoutReceipt> {
    return this.mutate("verifyMilestone", caller, (session, now) =>
      verifyMilestone(session, this.transfers, caller, milestoneId, now)
    );
  }

  setVerifier(caller: Principal, principal: Principal, enabled: boolean): Promise<void> {
    return this.mutate("setVerifier", caller, (session, now) => setVerifier(session, caller, principal, enabled, now));
  }

  setPlatformFee(caller: Principal, feeBps: number): Promise<void> {
    return this.mutate("setPlatformFee", caller, (session, now) => setPlatformFee(session, caller, feeBps, now));
  }

  setFeeRecipient(caller: Principal, recipient: Principal): Promise<void> {
    return this.mutate("setFeeRecipient", caller, (session, now) => setFeeRecipient(session, caller, recipient, now));
  }

  emergencyWithdraw(caller: Principal): Promise<number> {
    return this.mutate("emergencyWithdraw", caller, (session, now) =>
      emergencyWithdraw(session, this.transfers, caller, now)
    );
  }

  getProject(projectId: number): Promise<ProjectView> {
    return this.view(async (session) => toProjectView(await loadProject(session, projectId)));
  }

  getProjectContributors(projectId: number): Promise<Principal[]> {
    return this.view(async (session) => contributorsOf(await loadProject(session, projectId)));
  }

  getContribution(projectId: number, principal: Principal): Promise<number> {
    return this.view(async (session) => contributionOf(await loadProject(session, projectId), principal));
  }

  getResearcher(principal: Principal): Promise<ResearcherView> {
    return this.view((session) => getResearcher(session, principal));
  }

  getTotalProjects(): Promise<number> {
    return this.view((session) => session.currentId("project"));
  }

  getMilestone(milestoneId: number): Promise<MilestoneView> {
    return this.view((session) => loadMilestone(session, milestoneId));
  }

  getProjectMilestones(projectId: number): Promise<MilestoneView[]> {
    return this.view((session) => listProjectMilestones(session, projectId));
  }

  getTotalMilestones(): Promise<number> {
    return this.view((session) => session.currentId("milestone"));
  }

  getPlatform(): Promise<PlatformView> {
    return this.view((session) => getPlatformView(session));
  }

  isVerifier(principal: Principal): Promise<boolean> {
    return this.view((session) => session.isVerifier(principal));
  }

  getPoolBalance(): Promise<number> {
    return this.view(async (session) => (await session.getPlatform()).poolBalance);
  }

  getAccountBalance(principal: Principal): Promise<number> {
    return this.view((session) => session.getAccountBalance(principal));
  }

  getEvents(filter: EventFilter = {}): Promise<LedgerEvent[]> {
    return this.view((session) => session.listEvents(filter));
  }

  private async mutate<T>(
    operation: string,
    caller: Principal,
    work: (session: LedgerSession, now: Date) => Promise<T>
  ): Promise<T> {
    try {
      const result = await this.serializer.run(operation, () =>
        this.store.transaction((session) => work(session, this.clock.now()))
      );
      logInfo(`${operation} succeeded`, { caller });
      return result;
    } catch (error) {
      if (error instanceof LedgerError) {
        logWarn(`${operation} rejected (${error.code}): ${error.message}`, { caller });
      } else {
        logError(`${operation} failed: ${errorMessage(error)}`, error);
      }
      throw error;
    }
  }

  private view<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.store.read(work);
  }
}
