import { LedgerSession } from "../ledger/store";
import { EventDetails, LedgerEvent, LedgerEventType, Principal } from "../ledger/types";

interface EventFields {
  principal?: Principal;
  projectId?: number;
  milestoneId?: number;
  amount?: number;
  details?: EventDetails;
}

export const recordEvent = (
  session: LedgerSession,
  type: LedgerEventType,
  at: Date,
  fields: EventFields = {}
): Promise<LedgerEvent> =>
  session.appendEvent({
    type,
    at,
    principal: fields.principal ?? null,
    projectId: fields.projectId ?? null,
    milestoneId: fields.milestoneId ?? null,
    amount: fields.amount ?? null,
    details: fields.details ?? {},
  });
