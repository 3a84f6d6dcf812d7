import { CounterOverflowError, InvalidInputError } from "./errors";
import { normalizeAddress } from "./registry";
import { Address, AddressRecord, ObservedActivity, PatternKind, TransactionCategory } from "./types";

const U64_MAX = BigInt("18446744073709551615");

export const DEFAULT_EVALUATION_WINDOW_SIZE = 50;

export interface HistoryEntry {
  address: string;
  amount: bigint;
  now: number;
  category: TransactionCategory;
  transactionRef?: string;
}

export interface TransactionHistoryStoreOptions {
  evaluationWindowSize?: number;
}

function checkedIncrement(address: Address, counter: string, value: number): number {
  if (value >= Number.MAX_SAFE_INTEGER) {
    throw new CounterOverflowError(address, counter);
  }
  return value + 1;
}

function checkedVolume(address: Address, current: bigint, amount: bigint): bigint {
  const next = current + amount;
  if (next > U64_MAX) {
    throw new CounterOverflowError(address, "totalVolume");
  }
  return next;
}

function copyRecord(record: AddressRecord): AddressRecord {
  return { ...record, suspiciousPatternIds: [...record.suspiciousPatternIds] };
}

/**
 * Per-address rolling aggregates. Every mutation builds the next record in full
 * before replacing the stored one, so a rejected update leaves state untouched.
 */
export class TransactionHistoryStore {
  private readonly records = new Map<Address, AddressRecord>();
  private readonly activity = new Map<Address, ObservedActivity[]>();
  private readonly evaluationWindowSize: number;

  public constructor(options: TransactionHistoryStoreOptions = {}) {
    this.evaluationWindowSize = options.evaluationWindowSize ?? DEFAULT_EVALUATION_WINDOW_SIZE;
  }

  public record(entry: HistoryEntry, rapidTransactionWindowMs: number): AddressRecord {
    const address = normalizeAddress(entry.address);
    const next = this.prepare(address, entry, this.records.get(address), rapidTransactionWindowMs);
    this.commit(address, entry, next);
    return copyRecord(next);
  }

  /**
   * Records several entries as one update: every entry is checked before any is
   * stored, so an overflow on one party leaves all of them unchanged. Entries for
   * the same address apply in order.
   */
  public recordAll(entries: HistoryEntry[], rapidTransactionWindowMs: number): AddressRecord[] {
    const staged = new Map<Address, AddressRecord>();
    const prepared = entries.map((entry) => {
      const address = normalizeAddress(entry.address);
      const next = this.prepare(
        address,
        entry,
        staged.get(address) ?? this.records.get(address),
        rapidTransactionWindowMs
      );
      staged.set(address, next);
      return { address, entry, next };
    });

    for (const { address, entry, next } of prepared) {
      this.commit(address, entry, next);
    }
    return prepared.map(({ next }) => copyRecord(next));
  }

  public recordFailure(address: string, now: number): AddressRecord {
    const normalized = normalizeAddress(address);
    const existing = this.records.get(normalized);

    const next: AddressRecord = existing
      ? {
          ...existing,
          suspiciousPatternIds: [...existing.suspiciousPatternIds],
          failedTransactionCount: checkedIncrement(
            normalized,
            "failedTransactionCount",
            existing.failedTransactionCount
          ),
        }
      : {
          address: normalized,
          transactionCount: 0,
          totalVolume: BigInt(0),
          firstSeenAt: now,
          lastTransactionTime: now,
          rapidTransactionCount: 0,
          failedTransactionCount: 1,
          contractInteractionCount: 0,
          riskScore: 0,
          suspiciousPatternIds: [],
        };

    this.records.set(normalized, next);
    return copyRecord(next);
  }

  public setRiskScore(address: string, score: number): void {
    const record = this.records.get(normalizeAddress(address));
    if (record) {
      record.riskScore = score;
    }
  }

  public markPatterns(address: string, kinds: PatternKind[]): void {
    const record = this.records.get(normalizeAddress(address));
    if (!record) {
      return;
    }
    for (const kind of kinds) {
      if (!record.suspiciousPatternIds.includes(kind)) {
        record.suspiciousPatternIds.push(kind);
      }
    }
  }

  public get(address: string): AddressRecord | undefined {
    const record = this.records.get(normalizeAddress(address));
    return record ? copyRecord(record) : undefined;
  }

  public activityFor(address: string): ObservedActivity[] {
    return (this.activity.get(normalizeAddress(address)) ?? []).map((item) => ({ ...item }));
  }

  public snapshot(): AddressRecord[] {
    return Array.from(this.records.values())
      .map(copyRecord)
      .sort((a, b) => (a.address > b.address ? 1 : a.address < b.address ? -1 : 0));
  }

  public get size(): number {
    return this.records.size;
  }

  private prepare(
    address: Address,
    entry: HistoryEntry,
    existing: AddressRecord | undefined,
    rapidTransactionWindowMs: number
  ): AddressRecord {
    if (entry.amount < BigInt(0) || entry.amount > U64_MAX) {
      throw new InvalidInputError("amount", "must be an unsigned 64-bit value");
    }

    if (!existing) {
      return {
        address,
        transactionCount: 1,
        totalVolume: entry.amount,
        firstSeenAt: entry.now,
        lastTransactionTime: entry.now,
        rapidTransactionCount: 0,
        failedTransactionCount: 0,
        contractInteractionCount: entry.category === "contract" ? 1 : 0,
        riskScore: 0,
        suspiciousPatternIds: [],
      };
    }

    const isRapid = entry.now - existing.lastTransactionTime < rapidTransactionWindowMs;
    return {
      ...existing,
      suspiciousPatternIds: [...existing.suspiciousPatternIds],
      transactionCount: checkedIncrement(address, "transactionCount", existing.transactionCount),
      totalVolume: checkedVolume(address, existing.totalVolume, entry.amount),
      rapidTransactionCount: isRapid
        ? checkedIncrement(address, "rapidTransactionCount", existing.rapidTransactionCount)
        : 0,
      contractInteractionCount:
        entry.category === "contract"
          ? checkedIncrement(address, "contractInteractionCount", existing.contractInteractionCount)
          : existing.contractInteractionCount,
      lastTransactionTime: entry.now,
    };
  }

  private commit(address: Address, entry: HistoryEntry, next: AddressRecord) {
    this.records.set(address, next);
    this.pushActivity(address, {
      transactionRef: entry.transactionRef ?? `${address}:${next.transactionCount}`,
      amount: entry.amount,
      timestamp: entry.now,
      category: entry.category,
    });
  }

  private pushActivity(address: Address, item: ObservedActivity) {
    const window = this.activity.get(address) ?? [];
    window.push(item);
    if (window.length > this.evaluationWindowSize) {
      window.splice(0, window.length - this.evaluationWindowSize);
    }
    this.activity.set(address, window);
  }
}
