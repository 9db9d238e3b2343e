import mongoose, { type ClientSession } from "mongoose";
import Account from "../models/Account";
import Counter from "../models/Counter";
import LedgerEventModel from "../models/LedgerEvent";
import Milestone from "../models/Milestone";
import Platform, { PLATFORM_KEY } from "../models/Platform";
import Project from "../models/Project";
import Researcher from "../models/Researcher";
import Verifier from "../models/Verifier";
import { LedgerSession, LedgerStore } from "./store";
import {
  EventDetails,
  EventFilter,
  LEDGER_EVENT_TYPES,
  LedgerEvent,
  LedgerEventType,
  MilestoneRecord,
  NewLedgerEvent,
  PROJECT_STATUSES,
  PlatformInit,
  PlatformState,
  Principal,
  ProjectRecord,
  ProjectStatus,
  ResearcherRecord,
  Sequence,
} from "./types";
import { InvalidStateError } from "../utils/errors";

const toStatus = (value: string): ProjectStatus => {
  const status = PROJECT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown project status stored: ${value}`);
  }
  return status;
};

const toEventType = (value: string): LedgerEventType => {
  const type = LEDGER_EVENT_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new Error(`Unknown ledger event type stored: ${value}`);
  }
  return type;
};

const toDetails = (value: unknown): EventDetails => {
  const details: EventDetails = {};
  if (typeof value !== "object" || value === null) {
    return details;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string" || typeof entry === "number" || typeof entry === "boolean") {
      details[key] = entry;
    }
  }
  return details;
};

interface ResearcherDoc {
  principal: string;
  name: string;
  institution: string;
  expertise?: string[] | null;
  reputation: number;
  isVerified?: boolean | null;
  projectIds?: number[] | null;
}

interface ProjectDoc {
  projectId: number;
  researcher: string;
  title: string;
  description?: string | null;
  researchArea?: string | null;
  fundingGoal: number;
  currentFunding: number;
  deadline: Date;
  status: string;
  createdAt: Date;
  plannedMilestones?: string[] | null;
  contributions?: Array<{ contributor: string; amount: number }> | null;
}

interface MilestoneDoc {
  milestoneId: number;
  projectId: number;
  description: string;
  fundingAmount: number;
  completed?: boolean | null;
  verified?: boolean | null;
  completedAt?: Date | null;
  evidence?: string | null;
}

interface LedgerEventDoc {
  seq: number;
  type: string;
  at: Date;
  principal?: string | null;
  projectId?: number | null;
  milestoneId?: number | null;
  amount?: number | null;
  details?: unknown;
}

const toResearcher = (doc: ResearcherDoc): ResearcherRecord => ({
  principal: doc.principal,
  name: doc.name,
  institution: doc.institution,
  expertise: [...(doc.expertise ?? [])],
  reputation: doc.reputation,
  isVerified: doc.isVerified ?? false,
  projectIds: [...(doc.projectIds ?? [])],
});

const toProject = (doc: ProjectDoc): ProjectRecord => ({
  id: doc.projectId,
  researcher: doc.researcher,
  title: doc.title,
  description: doc.description ?? "",
  researchArea: doc.researchArea ?? "",
  fundingGoal: doc.fundingGoal,
  currentFunding: doc.currentFunding,
  deadline: doc.deadline,
  status: toStatus(doc.status),
  createdAt: doc.createdAt,
  plannedMilestones: [...(doc.plannedMilestones ?? [])],
  contributions: (doc.contributions ?? []).map(({ contributor, amount }) => ({ contributor, amount })),
});

const toMilestone = (doc: MilestoneDoc): MilestoneRecord => ({
  id: doc.milestoneId,
  projectId: doc.projectId,
  description: doc.description,
  fundingAmount: doc.fundingAmount,
  completed: doc.completed ?? false,
  verified: doc.verified ?? false,
  completedAt: doc.completedAt ?? null,
  evidence: doc.evidence ?? "",
});

const toEvent = (doc: LedgerEventDoc): LedgerEvent => ({
  seq: doc.seq,
  type: toEventType(doc.type),
  at: doc.at,
  principal: doc.principal ?? null,
  projectId: doc.projectId ?? null,
  milestoneId: doc.milestoneId ?? null,
  amount: doc.amount ?? null,
  details: toDetails(doc.details),
});

class MongoLedgerSession implements LedgerSession {
  constructor(private readonly session: ClientSession | null) {}

  private get options(): { session?: ClientSession } {
    return this.session ? { session: this.session } : {};
  }

  async getPlatform(): Promise<PlatformState> {
    const doc = await Platform.findOne({ key: PLATFORM_KEY }).session(this.session).lean();
    if (!doc) {
      throw new InvalidStateError("Ledger has not been initialized");
    }
    return {
      owner: doc.owner,
      feeBps: doc.feeBps,
      feeRecipient: doc.feeRecipient,
      poolBalance: doc.poolBalance,
    };
  }

  async savePlatform(state: PlatformState): Promise<void> {
    await Platform.updateOne(
      { key: PLATFORM_KEY },
      {
        $set: {
          owner: state.owner,
          feeBps: state.feeBps,
          feeRecipient: state.feeRecipient,
          poolBalance: state.poolBalance,
        },
      },
      { upsert: true, ...this.options }
    );
  }

  async nextId(sequence: Sequence): Promise<number> {
    const counter = await Counter.findOneAndUpdate(
      { name: sequence },
      { $inc: { value: 1 } },
      { new: true, upsert: true, ...this.options }
    ).lean();
    if (!counter) {
      throw new Error(`Failed to advance ${sequence} sequence`);
    }
    return counter.value;
  }

  async currentId(sequence: Sequence): Promise<number> {
    const counter = await Counter.findOne({ name: sequence }).session(this.session).lean();
    return counter?.value ?? 0;
  }

  async findResearcher(principal: Principal): Promise<ResearcherRecord | null> {
    const doc = await Researcher.findOne({ principal }).session(this.session).lean();
    return doc ? toResearcher(doc) : null;
  }

  async saveResearcher(researcher: ResearcherRecord): Promise<void> {
    await Researcher.updateOne(
      { principal: researcher.principal },
      {
        $set: {
          name: researcher.name,
          institution: researcher.institution,
          expertise: researcher.expertise,
          reputation: researcher.reputation,
          isVerified: researcher.isVerified,
          projectIds: researcher.projectIds,
        },
      },
      { upsert: true, ...this.options }
    );
  }

  async findProject(id: number): Promise<ProjectRecord | null> {
    const doc = await Project.findOne({ projectId: id }).session(this.session).lean();
    return doc ? toProject(doc) : null;
  }

  async saveProject(project: ProjectRecord): Promise<void> {
    await Project.updateOne(
      { projectId: project.id },
      {
        $set: {
          researcher: project.researcher,
          title: project.title,
          description: project.description,
          researchArea: project.researchArea,
          fundingGoal: project.fundingGoal,
          currentFunding: project.currentFunding,
          deadline: project.deadline,
          status: project.status,
          createdAt: project.createdAt,
          plannedMilestones: project.plannedMilestones,
          contributions: project.contributions,
        },
      },
      { upsert: true, ...this.options }
    );
  }

  async findMilestone(id: number): Promise<MilestoneRecord | null> {
    const doc = await Milestone.findOne({ milestoneId: id }).session(this.session).lean();
    return doc ? toMilestone(doc) : null;
  }

  async saveMilestone(milestone: MilestoneRecord): Promise<void> {
    await Milestone.updateOne(
      { milestoneId: milestone.id },
      {
        $set: {
          projectId: milestone.projectId,
          description: milestone.description,
          fundingAmount: milestone.fundingAmount,
          completed: milestone.completed,
          verified: milestone.verified,
          completedAt: milestone.completedAt,
          evidence: milestone.evidence,
        },
      },
      { upsert: true, ...this.options }
    );
  }

  async listMilestones(projectId: number): Promise<MilestoneRecord[]> {
    const docs = await Milestone.find({ projectId }).sort({ milestoneId: 1 }).session(this.session).lean();
    return docs.map(toMilestone);
  }

  async isVerifier(principal: Principal): Promise<boolean> {
    const doc = await Verifier.findOne({ principal }).session(this.session).lean();
    return doc?.enabled === true;
  }

  async setVerifier(principal: Principal, enabled: boolean): Promise<void> {
    await Verifier.updateOne({ principal }, { $set: { enabled } }, { upsert: true, ...this.options });
  }

  async getAccountBalance(principal: Principal): Promise<number> {
    const doc = await Account.findOne({ principal }).session(this.session).lean();
    return doc?.balance ?? 0;
  }

  async creditAccount(principal: Principal, amount: number): Promise<number> {
    const doc = await Account.findOneAndUpdate(
      { principal },
      { $inc: { balance: amount } },
      { new: true, upsert: true, ...this.options }
    ).lean();
    if (!doc) {
      throw new Error(`Failed to credit account ${principal}`);
    }
    return doc.balance;
  }

  async appendEvent(event: NewLedgerEvent): Promise<LedgerEvent> {
    const seq = await this.nextId("event");
    const stored: LedgerEvent = { ...event, details: { ...event.details }, seq };
    await LedgerEventModel.create([stored], this.options);
    return stored;
  }

  async listEvents(filter: EventFilter): Promise<LedgerEvent[]> {
    const query: { projectId?: number; milestoneId?: number; type?: string } = {};
    if (filter.projectId !== undefined) query.projectId = filter.projectId;
    if (filter.milestoneId !== undefined) query.milestoneId = filter.milestoneId;
    if (filter.type !== undefined) query.type = filter.type;
    const docs = await LedgerEventModel.find(query).sort({ seq: 1 }).session(this.session).lean();
    return docs.map(toEvent);
  }
}

/**
 * MongoDB-backed ledger. Writes go through a multi-document transaction, so the
 * server must run as a replica set (a single-node one is enough).
 */
export class MongoLedgerStore implements LedgerStore {
  constructor(private readonly connection: mongoose.Connection = mongoose.connection) {}

  async initialize(init: PlatformInit): Promise<boolean> {
    if (await Platform.exists({ key: PLATFORM_KEY })) {
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
    return this.connection.transaction<T>((session) => work(new MongoLedgerSession(session)));
  }

  async read<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return work(new MongoLedgerSession(null));
  }
}
