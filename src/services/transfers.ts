import { LedgerSession } from "../ledger/store";
import { Principal } from "../ledger/types";

export type TransferReason = "milestone-payout" | "platform-fee" | "emergency-withdrawal";

export interface Transfer {
  to: Principal;
  amount: number;
  reason: TransferReason;
  milestoneId: number | null;
}

/**
 * Moves value out of the pooled escrow. Delivery runs inside the caller's unit
 * of work: throwing aborts the whole operation, including state written before
 * the transfer was attempted.
 */
export interface TransferSink {
  deliver(session: LedgerSession, transfer: Transfer): Promise<void>;
}

// Default sink: credits the recipient's ledger account.
export const accountTransfers: TransferSink = {
  async deliver(session, transfer) {
    await session.creditAccount(transfer.to, transfer.amount);
  },
};
