import { LedgerSession } from "../ledger/store";
import { MilestoneRecord, PayoutReceipt, Principal } from "../ledger/types";
import { InvalidStateError, LedgerError, NotFoundError, TransferFailedError, errorMessage } from "../utils/errors";
import { logError, logInfo } from "../utils/logger";
import { recordEvent } from "./events";
import { splitFee } from "./fees";
import { requireOwner } from "./platform";
import { Transfer, TransferSink } from "./transfers";

export const REPUTATION_REWARD = 10;

const deliver = async (session: LedgerSession, transfers: TransferSink, transfer: Transfer): Promise<void> => {
  if (transfer.amount === 0) {
    return;
  }
  try {
    await transfers.deliver(session, transfer);
  } catch (error) {
    logError(`Transfer of ${transfer.amount} to ${transfer.to} failed (${transfer.reason})`, error);
    if (error instanceof LedgerError) {
      throw error;
    }
    throw new TransferFailedError(`Transfer to ${transfer.to} failed: ${errorMessage(error)}`, error);
  }
};

/**
 * Pays out a verified milestone from the pooled balance. The caller must have
 * persisted `verified = true` first; that flag is what makes a second release
 * impossible. The milestone amount is not checked against the project's own
 * contributions: payouts draw on the whole pool.
 */
export async function releaseMilestoneFunds(
  session: LedgerSession,
  transfers: TransferSink,
  milestone: MilestoneRecord,
  now: Date
): Promise<PayoutReceipt> {
  if (!milestone.verified) {
    throw new InvalidStateError(`Milestone ${milestone.id} must be verified before funds are released`);
  }

  const project = await session.findProject(milestone.projectId);
  if (!project) {
    throw new NotFoundError(`Project ${milestone.projectId} does not exist`);
  }
  const researcher = await session.findResearcher(project.researcher);
  if (!researcher) {
    throw new NotFoundError(`Researcher ${project.researcher} is not registered`);
  }
  const platform = await session.getPlatform();
  if (platform.poolBalance < milestone.fundingAmount) {
    throw new TransferFailedError(
      `Pooled balance ${platform.poolBalance} cannot cover milestone ${milestone.id} payout of ${milestone.fundingAmount}`
    );
  }

  const { fee, researcherShare } = splitFee(milestone.fundingAmount, platform.feeBps);

  // Internal state first; transfers run last.
  researcher.reputation += REPUTATION_REWARD;
  await session.saveResearcher(researcher);
  await session.savePlatform({ ...platform, poolBalance: platform.poolBalance - milestone.fundingAmount });
  await recordEvent(session, "FundsReleased", now, {
    principal: researcher.principal,
    projectId: project.id,
    milestoneId: milestone.id,
    amount: milestone.fundingAmount,
    details: { researcherShare, fee, feeRecipient: platform.feeRecipient, feeBps: platform.feeBps },
  });

  await deliver(session, transfers, {
    to: researcher.principal,
    amount: researcherShare,
    reason: "milestone-payout",
    milestoneId: milestone.id,
  });
  await deliver(session, transfers, {
    to: platform.feeRecipient,
    amount: fee,
    reason: "platform-fee",
    milestoneId: milestone.id,
  });

  logInfo(`Released milestone ${milestone.id} funds`, { researcher: researcher.principal, researcherShare, fee });
  return {
    milestoneId: milestone.id,
    projectId: project.id,
    researcher: researcher.principal,
    researcherShare,
    feeRecipient: platform.feeRecipient,
    fee,
    reputation: researcher.reputation,
  };
}

/** Owner-only escape hatch: sweeps the whole pool to the owner, ignoring project and milestone accounting. */
export async function emergencyWithdraw(
  session: LedgerSession,
  transfers: TransferSink,
  caller: Principal,
  now: Date
): Promise<number> {
  const platform = await requireOwner(session, caller);
  const amount = platform.poolBalance;

  await session.savePlatform({ ...platform, poolBalance: 0 });
  await recordEvent(session, "EmergencyWithdrawal", now, { principal: caller, amount });
  await deliver(session, transfers, { to: platform.owner, amount, reason: "emergency-withdrawal", milestoneId: null });
  return amount;
}
