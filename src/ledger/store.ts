import {
  EventFilter,
  LedgerEvent,
  MilestoneRecord,
  NewLedgerEvent,
  PlatformInit,
  PlatformState,
  Principal,
  ProjectRecord,
  ResearcherRecord,
  Sequence,
} from "./types";

/**
 * One unit of work against the ledger. Records handed out are copies: a change
 * only lands when it is passed back through the matching `save*` call, and
 * nothing lands at all if the surrounding transaction throws.
 */
export interface LedgerSession {
  getPlatform(): Promise<PlatformState>;
  savePlatform(state: PlatformState): Promise<void>;

  /** Advances the sequence and returns the new id (first id is 1). */
  nextId(sequence: Sequence): Promise<number>;
  /** Last id handed out by the sequence, 0 when none. */
  currentId(sequence: Sequence): Promise<number>;

  findResearcher(principal: Principal): Promise<ResearcherRecord | null>;
  saveResearcher(researcher: ResearcherRecord): Promise<void>;

  findProject(id: number): Promise<ProjectRecord | null>;
  saveProject(project: ProjectRecord): Promise<void>;

  findMilestone(id: number): Promise<MilestoneRecord | null>;
  saveMilestone(milestone: MilestoneRecord): Promise<void>;
  listMilestones(projectId: number): Promise<MilestoneRecord[]>;

  isVerifier(principal: Principal): Promise<boolean>;
  setVerifier(principal: Principal, enabled: boolean): Promise<void>;

  getAccountBalance(principal: Principal): Promise<number>;
  /** Returns the balance after the credit. */
  creditAccount(principal: Principal, amount: number): Promise<number>;

  appendEvent(event: NewLedgerEvent): Promise<LedgerEvent>;
  listEvents(filter: EventFilter): Promise<LedgerEvent[]>;
}

export interface LedgerStore {
  /** Creates platform parameters and the verifier set if the ledger is empty. Returns false when already initialized. */
  initialize(init: PlatformInit): Promise<boolean>;
  /** All-or-nothing: every write made through the session is discarded if `work` throws. */
  transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T>;
  read<T>(work: (session: LedgerSession) => Promise<T>): Promise<T>;
}
