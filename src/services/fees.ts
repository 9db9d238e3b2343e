import { FeeSplit } from "../ledger/types";

export const FEE_DENOMINATOR = 10_000;
export const MAX_FEE_BPS = 1_000;
export const DEFAULT_FEE_BPS = 250;

/** fee = floor(amount * feeBps / 10000); the researcher gets the remainder, so the parts always sum to `amount`. */
export const splitFee = (amount: number, feeBps: number): FeeSplit => {
  const fee = Number((BigInt(amount) * BigInt(feeBps)) / BigInt(FEE_DENOMINATOR));
  return { fee, researcherShare: amount - fee };
};
