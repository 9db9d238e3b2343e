import { LedgerSession } from "../ledger/store";
import { PlatformState, PlatformView, Principal } from "../ledger/types";
import { InvalidInputError, LimitExceededError, UnauthorizedError } from "../utils/errors";
import { requireText } from "../utils/validation";
import { recordEvent } from "./events";
import { MAX_FEE_BPS } from "./fees";

export async function requireOwner(session: LedgerSession, caller: Principal): Promise<PlatformState> {
  const platform = await session.getPlatform();
  if (platform.owner !== caller) {
    throw new UnauthorizedError(`Caller ${caller} is not the platform owner`);
  }
  return platform;
}

export async function requireVerifier(session: LedgerSession, caller: Principal): Promise<void> {
  if (!(await session.isVerifier(caller))) {
    throw new UnauthorizedError(`Caller ${caller} is not a trusted verifier`);
  }
}

export const validateFeeBps = (feeBps: number): number => {
  if (!Number.isInteger(feeBps) || feeBps < 0) {
    throw new InvalidInputError("feeBps must be a non-negative whole number of basis points");
  }
  if (feeBps > MAX_FEE_BPS) {
    throw new LimitExceededError(`feeBps ${feeBps} exceeds the ${MAX_FEE_BPS} basis point cap`);
  }
  return feeBps;
};

export async function setVerifier(
  session: LedgerSession,
  caller: Principal,
  principal: Principal,
  enabled: boolean,
  now: Date
): Promise<void> {
  await requireOwner(session, caller);
  requireText(principal, "principal");
  await session.setVerifier(principal, enabled);
  await recordEvent(session, "VerifierUpdated", now, { principal, details: { enabled } });
}

export async function setPlatformFee(session: LedgerSession, caller: Principal, feeBps: number, now: Date): Promise<void> {
  const platform = await requireOwner(session, caller);
  validateFeeBps(feeBps);
  await session.savePlatform({ ...platform, feeBps });
  await recordEvent(session, "PlatformFeeUpdated", now, {
    principal: caller,
    details: { from: platform.feeBps, to: feeBps },
  });
}

export async function setFeeRecipient(
  session: LedgerSession,
  caller: Principal,
  recipient: Principal,
  now: Date
): Promise<void> {
  const platform = await requireOwner(session, caller);
  requireText(recipient, "feeRecipient");
  await session.savePlatform({ ...platform, feeRecipient: recipient });
  await recordEvent(session, "FeeRecipientUpdated", now, {
    principal: caller,
    details: { from: platform.feeRecipient, to: recipient },
  });
}

export async function getPlatformView(session: LedgerSession): Promise<PlatformView> {
  const platform = await session.getPlatform();
  return {
    ...platform,
    totalProjects: await session.currentId("project"),
    totalMilestones: await session.currentId("milestone"),
  };
}
