import {
  CreatePaymentBodySchema,
  CreatePaymentResponseSchema,
  ListPaymentsResponseSchema,
  SubmitResultBodySchema,
  SubmitResultResponseSchema,
  type Amount,
  type CreatedPayment,
  type PaymentStatusEntry
} from "@agent-escrow/types/payments";
import type { NextAction } from "@agent-escrow/types/rest";
import { formatIssues } from "../config.js";
import type { EscrowContext } from "../context.js";
import { ProtocolError, StateError, ValidationError } from "../errors.js";
import { digest, type HexDigest } from "../hashing/content-hash.js";
import type { Logger } from "../logger.js";
import type { MonitorHandle, StatusCallback, StatusSource } from "../monitoring/status-monitor.js";
import {
  canTransition,
  isTerminal,
  snapshotFromEntry,
  type PaymentLifecycleState,
  type StatusSnapshot
} from "./lifecycle.js";
import { STATUS_PAGE_SIZE, findListedEntries } from "./status-listing.js";
import {
  timeWindowIssues,
  toIsoTimeString,
  type CompleteTimeWindows,
  type TimeWindows
} from "./time-windows.js";

export interface PaymentRequestOptions {
  agentIdentifier: string;
  identifierFromPurchaser: string;
  inputData: unknown;
  metadata?: string;
}

export interface PaymentReceipt {
  blockchainIdentifier: string;
  agentIdentifier: string;
  identifierFromPurchaser: string;
  inputHash: HexDigest;
  amounts: Amount[];
  timeWindows: CompleteTimeWindows;
  sellerVerificationKey?: string;
  nextAction?: NextAction;
}

export interface StatusBatch {
  snapshots: StatusSnapshot[];
  /** Tracked identifiers the service did not list. */
  missing: string[];
  observedAt: Date;
}

export interface CompletionReceipt {
  blockchainIdentifier: string;
  resultHash: HexDigest;
  onChainState: string | null;
  nextAction?: NextAction;
}

/**
 * Seller side of one or more escrow payments for a single purchaser request.
 * Every operation on an identifier requires the identifier to be tracked,
 * either because `create` minted it or because `track` registered it.
 */
export class PaymentRequest implements StatusSource {
  readonly agentIdentifier: string;
  readonly identifierFromPurchaser: string;
  private readonly inputData: unknown;
  private readonly metadata?: string;
  private readonly logger: Logger;
  private inputHashValue: HexDigest | undefined;
  private lifecycleState: PaymentLifecycleState = "Created";
  private readonly tracked = new Map<string, PaymentLifecycleState>();

  constructor(
    private readonly context: EscrowContext,
    options: PaymentRequestOptions
  ) {
    this.agentIdentifier = options.agentIdentifier;
    this.identifierFromPurchaser = options.identifierFromPurchaser;
    this.inputData = options.inputData;
    this.metadata = options.metadata;
    this.logger = context.logger.child({ component: "payment", agentIdentifier: options.agentIdentifier });
  }

  /**
   * Observes payments that were created elsewhere, e.g. by an earlier process.
   * The result can check status, monitor and complete, but not create.
   */
  static tracking(context: EscrowContext, blockchainIdentifiers: string[]): PaymentRequest {
    const request = new PaymentRequest(context, {
      agentIdentifier: "",
      identifierFromPurchaser: "",
      inputData: null
    });
    for (const id of blockchainIdentifiers) {
      request.track(id);
    }
    return request;
  }

  get inputHash(): HexDigest | undefined {
    return this.inputHashValue;
  }

  get state(): PaymentLifecycleState {
    return this.lifecycleState;
  }

  get trackedIds(): ReadonlySet<string> {
    return new Set(this.tracked.keys());
  }

  stateOf(blockchainIdentifier: string): PaymentLifecycleState | undefined {
    return this.tracked.get(blockchainIdentifier);
  }

  /** Starts tracking a payment that was created elsewhere. */
  track(blockchainIdentifier: string): void {
    if (blockchainIdentifier.trim().length === 0) {
      throw new ValidationError("Invalid blockchain identifier", ["identifier must not be empty"]);
    }
    if (!this.tracked.has(blockchainIdentifier)) {
      this.tracked.set(blockchainIdentifier, "Requested");
    }
    this.advance("Requested");
  }

  async create(timeWindows: TimeWindows, amounts: Amount[]): Promise<PaymentReceipt> {
    const inputHash = this.inputHashValue ?? digest(this.inputData);

    const { config } = this.context;
    const parsed = CreatePaymentBodySchema.safeParse({
      agentIdentifier: this.agentIdentifier,
      network: config.network,
      paymentContractAddress: config.paymentContractAddress,
      amounts: amounts.map(({ amount, unit }) => ({ amount, unit })),
      paymentType: config.paymentType,
      payByTime: toIsoTimeString(timeWindows.payByTime),
      submitResultTime: toIsoTimeString(timeWindows.submitResultTime),
      unlockTime: timeWindows.unlockTime && toIsoTimeString(timeWindows.unlockTime),
      externalDisputeUnlockTime:
        timeWindows.externalDisputeUnlockTime && toIsoTimeString(timeWindows.externalDisputeUnlockTime),
      inputHash,
      identifierFromPurchaser: this.identifierFromPurchaser,
      metadata: this.metadata
    });
    const issues = [
      ...(parsed.success ? [] : formatIssues(parsed.error)),
      ...timeWindowIssues(timeWindows)
    ];
    if (!parsed.success || issues.length > 0) {
      throw new ValidationError("Invalid payment request", issues);
    }
    this.inputHashValue = inputHash;

    const response = await this.context.paymentService.request("/payment/", {
      method: "POST",
      body: parsed.data,
      schema: CreatePaymentResponseSchema
    });
    const created = response.data;

    if (created.inputHash !== inputHash) {
      throw new ProtocolError("Payment service recorded a different input hash", {
        details: { expected: inputHash, received: created.inputHash }
      });
    }

    this.tracked.set(created.blockchainIdentifier, "Requested");
    this.advance("Requested");
    this.logger.info({ blockchainIdentifier: created.blockchainIdentifier }, "Payment request created");

    return this.toReceipt(created, amounts, timeWindows);
  }

  async checkStatus(blockchainIdentifier: string): Promise<StatusSnapshot> {
    this.requireTracked(blockchainIdentifier, "check status of");

    const found = await this.findPayments(new Set([blockchainIdentifier]));
    const entry = found.get(blockchainIdentifier);
    if (!entry) {
      throw new ProtocolError(`Payment ${blockchainIdentifier} is missing from the status listing`, {
        details: { blockchainIdentifier }
      });
    }
    return snapshotFromEntry(entry, new Date());
  }

  /** One listing walk covering every tracked identifier. */
  async checkStatuses(): Promise<StatusBatch> {
    if (this.tracked.size === 0) {
      throw new StateError("No payment is being tracked; create one first");
    }

    const byId = await this.findPayments(new Set(this.tracked.keys()));
    const observedAt = new Date();
    const snapshots: StatusSnapshot[] = [];
    const missing: string[] = [];

    for (const id of this.tracked.keys()) {
      const entry = byId.get(id);
      if (entry) {
        snapshots.push(snapshotFromEntry(entry, observedAt));
      } else {
        missing.push(id);
      }
    }

    return { snapshots, missing, observedAt };
  }

  async pollStatus(): Promise<StatusSnapshot[]> {
    const batch = await this.checkStatuses();
    return batch.snapshots;
  }

  /**
   * Applies a snapshot the caller has interpreted to the local bookkeeping of
   * its payment. Moves that would go backwards are ignored.
   */
  recordSnapshot(snapshot: StatusSnapshot): PaymentLifecycleState {
    const current = this.requireTracked(snapshot.blockchainIdentifier, "record status of");
    if (!canTransition(current, snapshot.lifecycle)) {
      return current;
    }
    this.tracked.set(snapshot.blockchainIdentifier, snapshot.lifecycle);
    this.advance(snapshot.lifecycle);
    return snapshot.lifecycle;
  }

  async complete(blockchainIdentifier: string, outputHash: HexDigest): Promise<CompletionReceipt> {
    const current = this.requireTracked(blockchainIdentifier, "complete");
    if (isTerminal(current)) {
      throw new StateError(`Payment ${blockchainIdentifier} is already ${current}`);
    }

    const { config } = this.context;
    const parsed = SubmitResultBodySchema.safeParse({
      network: config.network,
      paymentContractAddress: config.paymentContractAddress,
      hash: outputHash,
      identifier: blockchainIdentifier
    });
    if (!parsed.success) {
      throw new ValidationError("Invalid result submission", formatIssues(parsed.error));
    }

    const response = await this.context.paymentService.request("/payment/", {
      method: "PATCH",
      body: parsed.data,
      schema: SubmitResultResponseSchema
    });

    if (canTransition(current, "ResultSubmitted")) {
      this.tracked.set(blockchainIdentifier, "ResultSubmitted");
    }
    this.advance("ResultSubmitted");
    this.logger.info({ blockchainIdentifier }, "Result hash submitted");

    return {
      blockchainIdentifier,
      resultHash: outputHash,
      onChainState: response.data.onChainState ?? null,
      nextAction: response.data.NextAction
    };
  }

  startStatusMonitoring(callback: StatusCallback, intervalMs: number): MonitorHandle {
    return this.context.monitor.start(this, intervalMs, callback);
  }

  stopStatusMonitoring(): void {
    this.context.monitor.stop(this);
  }

  private async findPayments(ids: ReadonlySet<string>): Promise<Map<string, PaymentStatusEntry>> {
    return findListedEntries(async (cursorId) => {
      const response = await this.context.paymentService.request("/payment/", {
        query: { network: this.context.config.network, limit: STATUS_PAGE_SIZE, cursorId },
        schema: ListPaymentsResponseSchema
      });
      return response.data.Payments;
    }, ids);
  }

  private requireTracked(blockchainIdentifier: string, operation: string): PaymentLifecycleState {
    const state = this.tracked.get(blockchainIdentifier);
    if (state === undefined) {
      throw new StateError(
        `Cannot ${operation} payment ${blockchainIdentifier}: it was never created or tracked here`,
        { details: { blockchainIdentifier } }
      );
    }
    return state;
  }

  private advance(next: PaymentLifecycleState): void {
    if (canTransition(this.lifecycleState, next)) {
      this.lifecycleState = next;
    }
  }

  private toReceipt(
    created: CreatedPayment,
    amounts: Amount[],
    requested: TimeWindows
  ): PaymentReceipt {
    return {
      blockchainIdentifier: created.blockchainIdentifier,
      agentIdentifier: this.agentIdentifier,
      identifierFromPurchaser: this.identifierFromPurchaser,
      inputHash: created.inputHash,
      amounts: created.RequestedFunds ?? amounts,
      timeWindows: {
        payByTime: created.payByTime ?? requested.payByTime,
        submitResultTime: created.submitResultTime,
        unlockTime: created.unlockTime,
        externalDisputeUnlockTime: created.externalDisputeUnlockTime
      },
      sellerVerificationKey: created.SmartContractWallet?.walletVkey,
      nextAction: created.NextAction
    };
  }
}
