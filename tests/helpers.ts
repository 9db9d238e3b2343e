import { MemoryLedgerStore } from "../src/ledger/memoryStore";
import { ResearchLedger } from "../src/services/ledger";
import { TransferSink } from "../src/services/transfers";
import { Clock } from "../src/utils/clock";
import { LedgerError } from "../src/utils/errors";

export const OWNER = "owner-principal";
export const FEE_RECIPIENT = "treasury-principal";
export const VERIFIER = "verifier-one";
export const RESEARCHER = "researcher-ada";
export const FUNDER_A = "funder-a";
export const FUNDER_B = "funder-b";

const DAY_MS = 24 * 60 * 60 * 1000;

export class ManualClock implements Clock {
  private current: number;

  constructor(start = "2026-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceDays(days: number): void {
    this.current += days * DAY_MS;
  }
}

export interface TestLedgerOptions {
  feeBps?: number;
  transfers?: TransferSink;
}

export async function createTestLedger(options: TestLedgerOptions = {}) {
  const store = new MemoryLedgerStore();
  const clock = new ManualClock();
  await store.initialize({
    owner: OWNER,
    feeRecipient: FEE_RECIPIENT,
    feeBps: options.feeBps ?? 250,
    verifiers: [VERIFIER],
  });
  const ledger = new ResearchLedger({ store, clock, transfers: options.transfers });
  return { store, clock, ledger };
}

export const registerTestResearcher = (ledger: ResearchLedger, principal = RESEARCHER) =>
  ledger.registerResearcher(principal, {
    name: "Ada Researcher",
    institution: "Example Institute",
    expertise: ["genomics", "statistics"],
  });

export const createTestProject = (ledger: ResearchLedger, fundingGoal = 1000, researcher = RESEARCHER) =>
  ledger.createProject(researcher, {
    title: "Soil microbiome survey",
    description: "Sequencing samples from ten sites",
    researchArea: "ecology",
    fundingGoal,
    durationDays: 30,
    plannedMilestones: ["Collect samples", "Sequence", "Publish"],
  });

/** Creates a project for the already registered RESEARCHER and funds it to exactly its goal. */
export async function createFundedProject(ledger: ResearchLedger, fundingGoal = 1000): Promise<number> {
  const projectId = await createTestProject(ledger, fundingGoal);
  await ledger.fundProject(FUNDER_A, projectId, fundingGoal);
  return projectId;
}

/** Resolves with the LedgerError the operation was rejected with. */
export async function rejectionOf(operation: Promise<unknown>): Promise<LedgerError> {
  try {
    await operation;
  } catch (error) {
    if (error instanceof LedgerError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the operation to be rejected");
}
