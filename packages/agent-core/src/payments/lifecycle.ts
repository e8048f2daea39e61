import {
  PAYMENT_LIFECYCLE_STATES,
  TERMINAL_LIFECYCLE_STATES,
  type PaymentLifecycleState
} from "@agent-escrow/types/payments";
import type { NextAction } from "@agent-escrow/types/rest";

export type { PaymentLifecycleState };

export interface StatusSnapshot {
  blockchainIdentifier: string;
  onChainState: string | null;
  nextAction: NextAction;
  lifecycle: PaymentLifecycleState;
  resultHash?: string;
  observedAt: Date;
}

const ON_CHAIN_LIFECYCLE: Record<string, PaymentLifecycleState> = {
  FundsLocked: "FundsLocked",
  ResultSubmitted: "ResultSubmitted",
  RefundRequested: "FundsLocked",
  Withdrawn: "Completed",
  RefundWithdrawn: "Expired",
  FundsOrDatumInvalid: "Expired",
  Disputed: "Disputed",
  DisputedWithdrawn: "Disputed"
};

/**
 * Projects the service's on-chain state onto the local lifecycle. A record the
 * chain has not picked up yet (`null`) is still `Requested`; unknown states are
 * treated the same way until the chain reports something recognised.
 */
export function lifecycleFromOnChainState(onChainState: string | null): PaymentLifecycleState {
  if (onChainState === null) return "Requested";
  return ON_CHAIN_LIFECYCLE[onChainState] ?? "Requested";
}

export function isTerminal(state: PaymentLifecycleState): boolean {
  return TERMINAL_LIFECYCLE_STATES.includes(state);
}

/**
 * Lifecycle transitions only move forward. A terminal state is final, and any
 * non-terminal state may jump straight to a terminal one.
 */
export function canTransition(from: PaymentLifecycleState, to: PaymentLifecycleState): boolean {
  if (isTerminal(from)) return false;
  if (isTerminal(to)) return true;
  return PAYMENT_LIFECYCLE_STATES.indexOf(to) > PAYMENT_LIFECYCLE_STATES.indexOf(from);
}

export interface StatusEntry {
  blockchainIdentifier: string;
  onChainState: string | null;
  NextAction: NextAction;
  resultHash?: string | null;
}

export function snapshotFromEntry(entry: StatusEntry, observedAt: Date): StatusSnapshot {
  return {
    blockchainIdentifier: entry.blockchainIdentifier,
    onChainState: entry.onChainState,
    nextAction: entry.NextAction,
    lifecycle: lifecycleFromOnChainState(entry.onChainState),
    resultHash: entry.resultHash ?? undefined,
    observedAt
  };
}
