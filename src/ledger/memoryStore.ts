import { LedgerSession, LedgerStore } from "./store";
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
import { InvalidStateError } from "../utils/errors";

interface MemoryState {
  platform: PlatformState | null;
  sequences: Record<Sequence, number>;
  researchers: Map<Principal, ResearcherRecord>;
  projects: Map<number, ProjectRecord>;
  milestones: Map<number, MilestoneRecord>;
  verifiers: Map<Principal, boolean>;
  accounts: Map<Principal, number>;
  events: LedgerEvent[];
}

const emptyState = (): MemoryState => ({
  platform: null,
  sequences: { project: 0, milestone: 0, event: 0 },
  researchers: new Map(),
  projects: new Map(),
  milestones: new Map(),
  verifiers: new Map(),
  accounts: new Map(),
  events: [],
});

const matchesFilter = (event: LedgerEvent, filter: EventFilter): boolean =>
  (filter.projectId === undefined || event.projectId === filter.projectId) &&
  (filter.milestoneId === undefined || event.milestoneId === filter.milestoneId) &&
  (filter.type === undefined || event.type === filter.type);

class MemoryLedgerSession implements LedgerSession {
  constructor(private readonly state: () => MemoryState) {}

  async getPlatform(): Promise<PlatformState> {
    const platform = this.state().platform;
    if (!platform) {
      throw new InvalidStateError("Ledger has not been initialized");
    }
    return { ...platform };
  }

  async savePlatform(platform: PlatformState): Promise<void> {
    this.state().platform = { ...platform };
  }

  async nextId(sequence: Sequence): Promise<number> {
    const sequences = this.state().sequences;
    sequences[sequence] += 1;
    return sequences[sequence];
  }

  async currentId(sequence: Sequence): Promise<number> {
    return this.state().sequences[sequence];
  }

  async findResearcher(principal: Principal): Promise<ResearcherRecord | null> {
    const researcher = this.state().researchers.get(principal);
    return researcher ? structuredClone(researcher) : null;
  }

  async saveResearcher(researcher: ResearcherRecord): Promise<void> {
    this.state().researchers.set(researcher.principal, structuredClone(researcher));
  }

  async findProject(id: number): Promise<ProjectRecord | null> {
    const project = this.state().projects.get(id);
    return project ? structuredClone(project) : null;
  }

  async saveProject(project: ProjectRecord): Promise<void> {
    this.state().projects.set(project.id, structuredClone(project));
  }

  async findMilestone(id: number): Promise<MilestoneRecord | null> {
    const milestone = this.state().milestones.get(id);
    return milestone ? structuredClone(milestone) : null;
  }

  async saveMilestone(milestone: MilestoneRecord): Promise<void> {
    this.state().milestones.set(milestone.id, structuredClone(milestone));
  }

  async listMilestones(projectId: number): Promise<MilestoneRecord[]> {
    return [...this.state().milestones.values()]
      .filter((milestone) => milestone.projectId === projectId)
      .sort((a, b) => a.id - b.id)
      .map((milestone) => structuredClone(milestone));
  }

  async isVerifier(principal: Principal): Promise<boolean> {
    return this.state().verifiers.get(principal) === true;
  }

  async setVerifier(principal: Principal, enabled: boolean): Promise<void> {
    this.state().verifiers.set(principal, enabled);
  }

  async getAccountBalance(principal: Principal): Promise<number> {
    return this.state().accounts.get(principal) ?? 0;
  }

  async creditAccount(principal: Principal, amount: number): Promise<number> {
    const accounts = this.state().accounts;
    const balance = (accounts.get(principal) ?? 0) + amount;
    accounts.set(principal, balance);
    return balance;
  }

  async appendEvent(event: NewLedgerEvent): Promise<LedgerEvent> {
    const seq = await this.nextId("event");
    const stored: LedgerEvent = { ...structuredClone(event), seq };
    this.state().events.push(stored);
    return structuredClone(stored);
  }

  async listEvents(filter: EventFilter): Promise<LedgerEvent[]> {
    return this.state()
      .events.filter((event) => matchesFilter(event, filter))
      .map((event) => structuredClone(event));
  }
}

/**
 * Process-local ledger. A transaction works on a copy of the committed state
 * and publishes it only once `work` resolves; reads always see the last
 * committed state. Transactions must not overlap; ResearchLedger runs them one
 * at a time through its serializer.
 */
export class MemoryLedgerStore implements LedgerStore {
  private committed: MemoryState = emptyState();
  private readonly reader = new MemoryLedgerSession(() => this.committed);

  async initialize(init: PlatformInit): Promise<boolean> {
    if (this.committed.platform) {
      return false;
    }
    return this.transaction(async (session) => {
      await session.savePlatform({
        owner: init.owner,
        feeBps: init.feeBps,
        feeRecipient: init.feeRecipient,
        poolBalance: 0,
      });
      for (const verifier of new Set([init.owner, ...init.verifiers])) {
        await session.setVerifier(verifier, true);
      }
      return true;
    });
  }

  async transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    const working = structuredClone(this.committed);
    const result = await work(new MemoryLedgerSession(() => working));
    this.committed = working;
    return result;
  }

  async read<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return work(this.reader);
  }
}
