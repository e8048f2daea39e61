import type { Amount } from "@agent-escrow/types/payments";
import {
  CreatePurchaseBodySchema,
  CreatePurchaseResponseSchema,
  FUNDS_LOCKING_REQUESTED,
  ListPurchasesResponseSchema,
  RefundBodySchema,
  RefundResponseSchema,
  type PurchaseStatusEntry
} from "@agent-escrow/types/purchases";
import type { NextAction } from "@agent-escrow/types/rest";
import { formatIssues } from "../config.js";
import type { EscrowContext } from "../context.js";
import { ProtocolError, StateError, ValidationError } from "../errors.js";
import { digest, type HexDigest } from "../hashing/content-hash.js";
import type { Logger } from "../logger.js";
import type { MonitorHandle, StatusCallback, StatusSource } from "../monitoring/status-monitor.js";
import {
  canTransition,
  snapshotFromEntry,
  type PaymentLifecycleState,
  type StatusSnapshot
} from "./lifecycle.js";
import type { EscrowSession } from "./session.js";
import { STATUS_PAGE_SIZE, findListedEntries } from "./status-listing.js";
import { timeWindowIssues, toEpochMillisString, type CompleteTimeWindows } from "./time-windows.js";

export interface PurchaseRequestOptions {
  blockchainIdentifier: string;
  sellerVerificationKey: string;
  agentIdentifier: string;
  identifierFromPurchaser: string;
  timeWindows: CompleteTimeWindows;
  inputData: unknown;
  amounts?: Amount[];
  metadata?: string;
}

export interface PurchaseFromSessionOptions {
  inputData: unknown;
  sellerVerificationKey?: string;
  metadata?: string;
}

export interface PurchaseReceipt {
  purchaseId: string;
  blockchainIdentifier: string;
  inputHash: HexDigest;
  nextAction: NextAction;
}

export interface RefundReceipt {
  blockchainIdentifier: string;
  onChainState: string | null;
  nextAction?: NextAction;
}

export type RefundAction = "request" | "cancel";

const REFUND_PATHS: Record<RefundAction, string> = {
  request: "/purchase/request-refund",
  cancel: "/purchase/cancel-refund-request"
};

/**
 * Buyer side of an escrow payment: locks funds against a seller's existing
 * payment record, and asks for them back when the seller does not deliver.
 */
export class PurchaseRequest implements StatusSource {
  readonly blockchainIdentifier: string;
  readonly sellerVerificationKey: string;
  readonly agentIdentifier: string;
  readonly identifierFromPurchaser: string;
  readonly timeWindows: Readonly<CompleteTimeWindows>;
  private readonly inputData: unknown;
  private readonly amounts?: Amount[];
  private readonly metadata?: string;
  private readonly logger: Logger;
  private inputHashValue: HexDigest | undefined;
  private purchaseIdValue: string | undefined;
  private lifecycleState: PaymentLifecycleState = "Created";

  constructor(
    private readonly context: EscrowContext,
    options: PurchaseRequestOptions
  ) {
    this.blockchainIdentifier = options.blockchainIdentifier;
    this.sellerVerificationKey = options.sellerVerificationKey;
    this.agentIdentifier = options.agentIdentifier;
    this.identifierFromPurchaser = options.identifierFromPurchaser;
    this.timeWindows = { ...options.timeWindows };
    this.inputData = options.inputData;
    this.amounts = options.amounts;
    this.metadata = options.metadata;
    this.logger = context.logger.child({
      component: "purchase",
      blockchainIdentifier: options.blockchainIdentifier
    });
  }

  /**
   * Builds a purchase from the terms a seller published. The buyer's input
   * must hash to the value the seller committed to.
   */
  static fromSession(
    context: EscrowContext,
    session: EscrowSession,
    options: PurchaseFromSessionOptions
  ): PurchaseRequest {
    const sellerVerificationKey = options.sellerVerificationKey ?? session.sellerVerificationKey;
    if (!sellerVerificationKey) {
      throw new ValidationError("Invalid purchase request", [
        "sellerVerificationKey is required when the session does not carry one"
      ]);
    }

    const inputHash = digest(options.inputData);
    if (inputHash !== session.inputHash) {
      throw new ValidationError("Invalid purchase request", [
        "inputData does not hash to the input hash committed by the seller"
      ]);
    }

    return new PurchaseRequest(context, {
      blockchainIdentifier: session.blockchainIdentifier,
      sellerVerificationKey,
      agentIdentifier: session.agentIdentifier,
      identifierFromPurchaser: session.identifierFromPurchaser,
      timeWindows: { ...session.timeWindows },
      inputData: options.inputData,
      amounts: session.amounts.map((amount) => ({ ...amount })),
      metadata: options.metadata
    });
  }

  get inputHash(): HexDigest | undefined {
    return this.inputHashValue;
  }

  get purchaseId(): string | undefined {
    return this.purchaseIdValue;
  }

  get state(): PaymentLifecycleState {
    return this.lifecycleState;
  }

  async create(): Promise<PurchaseReceipt> {
    if (this.purchaseIdValue !== undefined) {
      throw new StateError(`Purchase for ${this.blockchainIdentifier} was already created`, {
        details: { purchaseId: this.purchaseIdValue }
      });
    }

    const inputHash = this.inputHashValue ?? digest(this.inputData);

    const { config } = this.context;
    const parsed = CreatePurchaseBodySchema.safeParse({
      blockchainIdentifier: this.blockchainIdentifier,
      network: config.network,
      sellerVkey: this.sellerVerificationKey,
      agentIdentifier: this.agentIdentifier,
      identifierFromPurchaser: this.identifierFromPurchaser,
      paymentType: config.paymentType,
      smartContractAddress: config.paymentContractAddress,
      payByTime: toEpochMillisString(this.timeWindows.payByTime),
      submitResultTime: toEpochMillisString(this.timeWindows.submitResultTime),
      unlockTime: toEpochMillisString(this.timeWindows.unlockTime),
      externalDisputeUnlockTime: toEpochMillisString(this.timeWindows.externalDisputeUnlockTime),
      inputHash,
      amounts: this.amounts?.map(({ amount, unit }) => ({ amount, unit })),
      metadata: this.metadata
    });
    const issues = [
      ...(parsed.success ? [] : formatIssues(parsed.error)),
      ...timeWindowIssues(this.timeWindows)
    ];
    if (!parsed.success || issues.length > 0) {
      throw new ValidationError("Invalid purchase request", issues);
    }
    this.inputHashValue = inputHash;

    const response = await this.context.paymentService.request("/purchase/", {
      method: "POST",
      body: parsed.data,
      schema: CreatePurchaseResponseSchema
    });
    const created = response.data;

    if (created.NextAction.requestedAction !== FUNDS_LOCKING_REQUESTED) {
      throw new ProtocolError(
        `Expected next action ${FUNDS_LOCKING_REQUESTED}, service reported ${created.NextAction.requestedAction}`,
        { details: { purchaseId: created.id, nextAction: created.NextAction } }
      );
    }

    this.purchaseIdValue = created.id;
    this.advance("Requested");
    this.logger.info({ purchaseId: created.id }, "Purchase created, funds locking requested");

    return {
      purchaseId: created.id,
      blockchainIdentifier: this.blockchainIdentifier,
      inputHash,
      nextAction: created.NextAction
    };
  }

  async checkStatus(): Promise<StatusSnapshot> {
    this.requireCreated("check status of");
    return fetchPurchaseStatus(this.context, this.blockchainIdentifier);
  }

  async pollStatus(): Promise<StatusSnapshot[]> {
    return [await this.checkStatus()];
  }

  /**
   * Applies a snapshot of this purchase to its lifecycle state. Moves that
   * would go backwards are ignored.
   */
  recordSnapshot(snapshot: StatusSnapshot): PaymentLifecycleState {
    this.requireCreated("record status of");
    if (snapshot.blockchainIdentifier !== this.blockchainIdentifier) {
      throw new StateError(
        `Snapshot for ${snapshot.blockchainIdentifier} does not belong to purchase ${this.blockchainIdentifier}`
      );
    }
    this.advance(snapshot.lifecycle);
    return this.lifecycleState;
  }

  /**
   * Asks for the locked funds back. Only meaningful once `submitResultTime`
   * has passed without a result; the caller decides when that is.
   */
  async requestRefund(): Promise<RefundReceipt> {
    return this.sendRefundAction("request");
  }

  async cancelRefundRequest(): Promise<RefundReceipt> {
    return this.sendRefundAction("cancel");
  }

  startStatusMonitoring(callback: StatusCallback, intervalMs: number): MonitorHandle {
    return this.context.monitor.start(this, intervalMs, callback);
  }

  stopStatusMonitoring(): void {
    this.context.monitor.stop(this);
  }

  private async sendRefundAction(action: RefundAction): Promise<RefundReceipt> {
    this.requireCreated("refund");
    const receipt = await submitRefundAction(this.context, this.blockchainIdentifier, action);
    this.logger.info(
      { purchaseId: this.purchaseIdValue },
      action === "request" ? "Refund requested" : "Refund request cancelled"
    );
    return receipt;
  }

  private requireCreated(operation: string): void {
    if (this.purchaseIdValue === undefined) {
      throw new StateError(
        `Cannot ${operation} purchase ${this.blockchainIdentifier} before it has been created`
      );
    }
  }

  private advance(next: PaymentLifecycleState): void {
    if (canTransition(this.lifecycleState, next)) {
      this.lifecycleState = next;
    }
  }
}

/** Status of any purchase the service lists, or undefined when it lists none by that identifier. */
export async function findPurchaseStatus(
  context: EscrowContext,
  blockchainIdentifier: string
): Promise<StatusSnapshot | undefined> {
  const found = await findListedEntries<PurchaseStatusEntry>(async (cursorId) => {
    const response = await context.paymentService.request("/purchase/", {
      query: { network: context.config.network, limit: STATUS_PAGE_SIZE, cursorId },
      schema: ListPurchasesResponseSchema
    });
    return response.data.Purchases;
  }, new Set([blockchainIdentifier]));
  const entry = found.get(blockchainIdentifier);
  return entry ? snapshotFromEntry(entry, new Date()) : undefined;
}

export async function fetchPurchaseStatus(
  context: EscrowContext,
  blockchainIdentifier: string
): Promise<StatusSnapshot> {
  const snapshot = await findPurchaseStatus(context, blockchainIdentifier);
  if (!snapshot) {
    throw new ProtocolError(`Purchase ${blockchainIdentifier} is missing from the status listing`, {
      details: { blockchainIdentifier }
    });
  }
  return snapshot;
}

export async function submitRefundAction(
  context: EscrowContext,
  blockchainIdentifier: string,
  action: RefundAction
): Promise<RefundReceipt> {
  const parsed = RefundBodySchema.safeParse({ blockchainIdentifier, network: context.config.network });
  if (!parsed.success) {
    throw new ValidationError("Invalid refund request", formatIssues(parsed.error));
  }
  const response = await context.paymentService.request(REFUND_PATHS[action], {
    method: "POST",
    body: parsed.data,
    schema: RefundResponseSchema
  });
  return {
    blockchainIdentifier,
    onChainState: response.data.onChainState ?? null,
    nextAction: response.data.NextAction
  };
}
