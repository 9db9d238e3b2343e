// Authenticated caller identity (wallet address, account id). Opaque to the ledger.
export type Principal = string;

export const PROJECT_STATUSES = ["Active", "Funded", "InProgress", "Completed", "Cancelled"] as const;
export type ProjectStatus = typeof PROJECT_STATUSES[number];

export const SEQUENCES = ["project", "milestone", "event"] as const;
export type Sequence = typeof SEQUENCES[number];

export interface ResearcherRecord {
  principal: Principal;
  name: string;
  institution: string;
  expertise: string[];
  reputation: number;
  isVerified: boolean;
  projectIds: number[];
}

export interface Contribution {
  contributor: Principal;
  amount: number;
}

export interface ProjectRecord {
  id: number;
  researcher: Principal;
  title: string;
  description: string;
  researchArea: string;
  fundingGoal: number;
  currentFunding: number;
  deadline: Date;
  status: ProjectStatus;
  createdAt: Date;
  plannedMilestones: string[];
  // Insertion-ordered; one entry per contributor with a non-zero total.
  contributions: Contribution[];
}

export interface MilestoneRecord {
  id: number;
  projectId: number;
  description: string;
  fundingAmount: number;
  completed: boolean;
  verified: boolean;
  completedAt: Date | null;
  evidence: string;
}

export interface PlatformState {
  owner: Principal;
  feeBps: number;
  feeRecipient: Principal;
  // Escrow: every contribution lands here, every payout is drawn from here.
  poolBalance: number;
}

export const LEDGER_EVENT_TYPES = [
  "ResearcherRegistered",
  "ProjectCreated",
  "ProjectFunded",
  "ProjectStatusChanged",
  "MilestoneCreated",
  "MilestoneCompleted",
  "MilestoneVerified",
  "FundsReleased",
  "VerifierUpdated",
  "PlatformFeeUpdated",
  "FeeRecipientUpdated",
  "EmergencyWithdrawal",
] as const;
export type LedgerEventType = typeof LEDGER_EVENT_TYPES[number];

export type EventDetails = Record<string, string | number | boolean>;

export interface LedgerEvent {
  seq: number;
  type: LedgerEventType;
  at: Date;
  principal: Principal | null;
  projectId: number | null;
  milestoneId: number | null;
  amount: number | null;
  details: EventDetails;
}

export type NewLedgerEvent = Omit<LedgerEvent, "seq">;

export interface EventFilter {
  projectId?: number;
  milestoneId?: number;
  type?: LedgerEventType;
}

export interface ResearcherInput {
  name: string;
  institution: string;
  expertise: string[];
}

export interface ProjectInput {
  title: string;
  description: string;
  researchArea: string;
  fundingGoal: number;
  durationDays: number;
  plannedMilestones: string[];
}

export interface MilestoneInput {
  projectId: number;
  description: string;
  fundingAmount: number;
}

export type ResearcherView = ResearcherRecord;

export interface ProjectView {
  id: number;
  researcher: Principal;
  title: string;
  description: string;
  researchArea: string;
  fundingGoal: number;
  currentFunding: number;
  deadline: Date;
  status: ProjectStatus;
  createdAt: Date;
  plannedMilestones: string[];
  contributorCount: number;
}

export type MilestoneView = MilestoneRecord;

export interface PlatformView extends PlatformState {
  totalProjects: number;
  totalMilestones: number;
}

export interface FundingReceipt {
  projectId: number;
  contributor: Principal;
  contribution: number;
  currentFunding: number;
  status: ProjectStatus;
}

export interface FeeSplit {
  fee: number;
  researcherShare: number;
}

export interface PayoutReceipt extends FeeSplit {
  milestoneId: number;
  projectId: number;
  researcher: Principal;
  feeRecipient: Principal;
  reputation: number;
}

export interface PlatformInit {
  owner: Principal;
  feeRecipient: Principal;
  feeBps: number;
  verifiers: Principal[];
}
