import { LedgerSession } from "../ledger/store";
import { Principal, ResearcherInput, ResearcherRecord, ResearcherView } from "../ledger/types";
import { NotFoundError, UnauthorizedError } from "../utils/errors";
import { requireText } from "../utils/validation";
import { recordEvent } from "./events";

export const INITIAL_REPUTATION = 100;

/**
 * Creates or overwrites the caller's researcher record. A repeat registration
 * replaces the profile and resets reputation, but the caller keeps the
 * projects already created.
 */
export async function registerResearcher(
  session: LedgerSession,
  principal: Principal,
  input: ResearcherInput,
  now: Date
): Promise<ResearcherRecord> {
  requireText(input.name, "name");
  requireText(input.institution, "institution");

  const existing = await session.findResearcher(principal);
  const researcher: ResearcherRecord = {
    principal,
    name: input.name,
    institution: input.institution,
    expertise: [...input.expertise],
    reputation: INITIAL_REPUTATION,
    isVerified: false,
    projectIds: existing ? existing.projectIds : [],
  };
  await session.saveResearcher(researcher);
  await recordEvent(session, "ResearcherRegistered", now, {
    principal,
    details: { name: input.name, institution: input.institution, reRegistration: existing !== null },
  });
  return researcher;
}

export async function getResearcher(session: LedgerSession, principal: Principal): Promise<ResearcherView> {
  const researcher = await session.findResearcher(principal);
  if (!researcher) {
    throw new NotFoundError(`Researcher ${principal} is not registered`);
  }
  return researcher;
}

// Registration is a capability: callers without a record may not act as researchers.
export async function requireRegisteredResearcher(
  session: LedgerSession,
  principal: Principal
): Promise<ResearcherRecord> {
  const researcher = await session.findResearcher(principal);
  if (!researcher) {
    throw new UnauthorizedError(`Caller ${principal} is not a registered researcher`);
  }
  return researcher;
}
