import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  AddressRecord,
  AddressRegistry,
  AdminAuthorizationError,
  AiBlendConfig,
  Alert,
  BatchTransaction,
  BlendOutcome,
  buildOracleContext,
  copyThresholds,
  CounterOverflowError,
  DEFAULT_AI_BLEND_CONFIG,
  DEFAULT_RISK_THRESHOLDS,
  detectBatchPatterns,
  detectPatterns,
  maybeAlert,
  normalizeAddress,
  ObservedTransaction,
  PatternFinding,
  RiskEvent,
  RiskFactor,
  riskLevel,
  RiskThresholds,
  ruleOnlyOutcome,
  score,
  scoreWithBreakdown,
  TransactionCategory,
  TransactionHistoryStore,
  validateAiBlendConfig,
  validateThresholds,
  WalletRiskInfo,
} from "risk-scoring";
import { AiRiskBlendService } from "../ai-risk/aiRiskBlend.service";
import { DetectorConfig } from "../config";
import { RiskEventPublisher } from "../events/riskEventPublisher.service";

export interface ScoreTransactionInput {
  transactionRef?: string;
  sender: string;
  recipient: string;
  amount: bigint;
  category: TransactionCategory;
  now?: number;
}

export interface ScoreTransactionResult {
  transactionRef: string;
  monitored: boolean;
  senderScore: number;
  recipientScore: number;
  findings: PatternFinding[];
  alert?: Alert;
  ai?: {
    sender: BlendOutcome;
    recipient: BlendOutcome;
  };
}

/**
 * Hosts one engine instance: registry, thresholds, AI blend settings and the
 * per-address history. History updates and rule scoring for a transaction run
 * without yielding to the event loop; only the oracle call awaits.
 */
@Injectable()
export class RiskDetectorService {
  private readonly logger = new Logger(RiskDetectorService.name);
  private readonly registry = new AddressRegistry();
  private readonly history: TransactionHistoryStore;
  private readonly watched = new Set<string>();
  private transactionSequence = 0;
  private readonly adminAddress: string;
  private thresholds: RiskThresholds;
  private aiConfig: AiBlendConfig;
  private monitoringEnabled: boolean;

  public constructor(
    configService: ConfigService,
    private readonly aiRiskBlendService: AiRiskBlendService,
    private readonly eventPublisher: RiskEventPublisher
  ) {
    const detector = configService.get<DetectorConfig>("detector");
    const blend = configService.get<AiBlendConfig>("aiScoring.blend");

    this.adminAddress = normalizeAddress(detector?.adminAddress ?? "");
    this.monitoringEnabled = detector?.monitoringEnabled ?? true;
    this.thresholds = validateThresholds(detector?.thresholds ?? DEFAULT_RISK_THRESHOLDS);
    this.aiConfig = validateAiBlendConfig(blend ?? DEFAULT_AI_BLEND_CONFIG);
    this.history = new TransactionHistoryStore({ evaluationWindowSize: detector?.evaluationWindowSize });

    if (!this.adminAddress) {
      this.logger.warn("No administrator address configured; admin operations will be rejected");
    }
  }

  public async recordAndScore(input: ScoreTransactionInput): Promise<ScoreTransactionResult> {
    const now = input.now ?? Date.now();
    const transactionRef = input.transactionRef ?? this.nextTransactionRef(now);

    if (!this.monitoringEnabled) {
      return { transactionRef, monitored: false, senderScore: 0, recipientScore: 0, findings: [] };
    }

    const thresholds = copyThresholds(this.thresholds);
    const aiConfig = { ...this.aiConfig };
    const transaction: ObservedTransaction = {
      transactionRef,
      sender: normalizeAddress(input.sender),
      recipient: normalizeAddress(input.recipient),
      amount: input.amount,
      category: input.category,
      timestamp: now,
    };

    const [senderRecord, recipientRecord] = this.recordTransfer(transaction, thresholds);

    const senderRule = scoreWithBreakdown({
      address: transaction.sender,
      amount: transaction.amount,
      now,
      registry: this.registry,
      thresholds,
      history: senderRecord,
    });
    const recipientRule = scoreWithBreakdown({
      address: transaction.recipient,
      amount: transaction.amount,
      now,
      registry: this.registry,
      thresholds,
      history: recipientRecord,
    });
    this.history.setRiskScore(transaction.sender, senderRule.score);
    this.history.setRiskScore(transaction.recipient, recipientRule.score);

    const senderFindings = detectPatterns(
      transaction.sender,
      senderRecord,
      thresholds,
      this.history.activityFor(transaction.sender),
      now
    );
    const recipientFindings = detectPatterns(
      transaction.recipient,
      recipientRecord,
      thresholds,
      this.history.activityFor(transaction.recipient),
      now
    );
    this.history.markPatterns(transaction.sender, senderFindings.map((finding) => finding.patternKind));
    this.history.markPatterns(transaction.recipient, recipientFindings.map((finding) => finding.patternKind));
    const findings = [...senderFindings, ...recipientFindings];

    const [senderOutcome, recipientOutcome] = aiConfig.enabled
      ? await this.aiRiskBlendService.blend(
          [senderRule.score, recipientRule.score],
          buildOracleContext({
            transaction,
            ruleScore: Math.max(senderRule.score, recipientRule.score),
            senderRecord,
            recipientRecord,
            registry: this.registry,
            thresholds,
          }),
          aiConfig
        )
      : [ruleOnlyOutcome(senderRule.score, false), ruleOnlyOutcome(recipientRule.score, false)];

    const alert = maybeAlert(senderOutcome.score, recipientOutcome.score, findings, transaction);

    const riskFactors = Array.from(new Set<RiskFactor>([...senderRule.factors, ...recipientRule.factors]));
    const events: RiskEvent[] = [
      {
        type: "transaction_analysis",
        payload: {
          transactionRef,
          sender: transaction.sender,
          recipient: transaction.recipient,
          amount: transaction.amount,
          category: transaction.category,
          riskFactors,
          finalRiskScore: Math.max(senderOutcome.score, recipientOutcome.score),
          timestamp: now,
        },
      },
      ...findings.map((payload): RiskEvent => ({ type: "pattern_finding", payload })),
      ...(alert ? [{ type: "alert" as const, payload: alert }] : []),
      ...this.monitoringUpdates(transaction, now),
    ];

    await this.eventPublisher.publish({
      transactionRef,
      events,
      alert,
      aiApplied: senderOutcome.applied || recipientOutcome.applied,
      findings,
    });

    this.logger.debug(
      {
        transactionRef,
        senderScore: senderOutcome.score,
        recipientScore: recipientOutcome.score,
        findings: findings.length,
        alert: alert?.severity,
      },
      "Transaction scored"
    );

    return {
      transactionRef,
      monitored: true,
      senderScore: senderOutcome.score,
      recipientScore: recipientOutcome.score,
      findings,
      alert,
      ai: aiConfig.enabled ? { sender: senderOutcome, recipient: recipientOutcome } : undefined,
    };
  }

  public recordFailedTransaction(address: string, now = Date.now()): AddressRecord | undefined {
    if (!this.monitoringEnabled) {
      return undefined;
    }

    const normalized = normalizeAddress(address);
    const record = this.guardOverflow(() => this.history.recordFailure(normalized, now));
    const refreshed = score({
      address: normalized,
      amount: BigInt(0),
      now,
      registry: this.registry,
      thresholds: this.thresholds,
      history: record,
    });
    this.history.setRiskScore(normalized, refreshed);

    return this.history.get(normalized);
  }

  public async analyzeBatch(address: string, transactions: BatchTransaction[], now = Date.now()) {
    const normalized = normalizeAddress(address);
    const findings = detectBatchPatterns(normalized, transactions, this.thresholds, this.history.get(normalized), now);

    if (findings.length) {
      await this.eventPublisher.publish({
        events: findings.map((payload): RiskEvent => ({ type: "pattern_finding", payload })),
        findings,
      });
    }

    return findings;
  }

  public setThresholds(caller: string, thresholds: RiskThresholds): RiskThresholds {
    this.assertAdmin(caller);
    this.thresholds = validateThresholds(thresholds);
    this.logger.log({ caller: normalizeAddress(caller) }, "Risk thresholds updated");
    return copyThresholds(this.thresholds);
  }

  public setAiConfig(caller: string, config: AiBlendConfig): AiBlendConfig {
    this.assertAdmin(caller);
    this.aiConfig = validateAiBlendConfig(config);
    this.logger.log({ caller: normalizeAddress(caller), enabled: config.enabled }, "AI blend configuration updated");
    return { ...this.aiConfig };
  }

  public setMonitoringEnabled(caller: string, enabled: boolean): boolean {
    this.assertAdmin(caller);
    this.monitoringEnabled = enabled;
    this.logger.log({ caller: normalizeAddress(caller), enabled }, "Monitoring toggled");
    return this.monitoringEnabled;
  }

  public addToBlacklist(caller: string, addresses: string[]): string[] {
    this.assertAdmin(caller);
    return this.registry.addToBlacklist(addresses);
  }

  public addToWhitelist(caller: string, addresses: string[]): string[] {
    this.assertAdmin(caller);
    return this.registry.addToWhitelist(addresses);
  }

  public removeFromBlacklist(caller: string, addresses: string[]): string[] {
    this.assertAdmin(caller);
    return this.registry.removeFromBlacklist(addresses);
  }

  public removeFromWhitelist(caller: string, addresses: string[]): string[] {
    this.assertAdmin(caller);
    return this.registry.removeFromWhitelist(addresses);
  }

  public riskScore(address: string): number {
    return this.history.get(address)?.riskScore ?? 0;
  }

  public isBlacklisted(address: string): boolean {
    return this.registry.isBlacklisted(address);
  }

  public isWhitelisted(address: string): boolean {
    return this.registry.isWhitelisted(address);
  }

  public transactionCount(address: string): number {
    return this.history.get(address)?.transactionCount ?? 0;
  }

  public addressRecord(address: string): AddressRecord | undefined {
    return this.history.get(address);
  }

  public walletRisk(address: string): WalletRiskInfo {
    const riskScore = this.riskScore(address);
    return {
      address: normalizeAddress(address),
      riskScore,
      isBlacklisted: this.isBlacklisted(address),
      isWhitelisted: this.isWhitelisted(address),
      transactionCount: this.transactionCount(address),
      riskLevel: riskLevel(riskScore),
    };
  }

  public getThresholds(): RiskThresholds {
    return copyThresholds(this.thresholds);
  }

  public getAiConfig(): AiBlendConfig {
    return { ...this.aiConfig };
  }

  public isMonitoringEnabled(): boolean {
    return this.monitoringEnabled;
  }

  public get admin(): string {
    return this.adminAddress;
  }

  public addressRecords(): AddressRecord[] {
    return this.history.snapshot();
  }

  public watch(address: string): boolean {
    const normalized = normalizeAddress(address);
    const added = !this.watched.has(normalized);
    this.watched.add(normalized);
    return added;
  }

  public unwatch(address: string): boolean {
    return this.watched.delete(normalizeAddress(address));
  }

  public watchedAddresses(): string[] {
    return Array.from(this.watched).sort();
  }

  public drainEvents(): RiskEvent[] {
    return this.eventPublisher.drain();
  }

  private assertAdmin(caller: string) {
    if (!this.adminAddress || normalizeAddress(caller) !== this.adminAddress) {
      this.logger.warn({ caller }, "Rejected admin operation from non-admin caller");
      throw new AdminAuthorizationError(caller);
    }
  }

  private nextTransactionRef(now: number): string {
    this.transactionSequence += 1;
    return `tx-${now}-${this.transactionSequence}`;
  }

  private recordTransfer(transaction: ObservedTransaction, thresholds: RiskThresholds): [AddressRecord, AddressRecord] {
    const entry = {
      amount: transaction.amount,
      now: transaction.timestamp,
      transactionRef: transaction.transactionRef,
    };
    const [sender, recipient] = this.guardOverflow(() =>
      this.history.recordAll(
        [
          { ...entry, address: transaction.sender, category: transaction.category },
          { ...entry, address: transaction.recipient, category: "receive" },
        ],
        thresholds.rapidTransactionWindowMs
      )
    );
    return [sender, recipient];
  }

  private guardOverflow<T>(update: () => T): T {
    try {
      return update();
    } catch (error) {
      if (error instanceof CounterOverflowError) {
        this.logger.error({ address: error.address, counter: error.counter }, "Address counter overflow");
      }
      throw error;
    }
  }

  private monitoringUpdates(transaction: ObservedTransaction, now: number): RiskEvent[] {
    return Array.from(new Set([transaction.sender, transaction.recipient]))
      .filter((address) => this.watched.has(address))
      .map((address) => ({
        type: "wallet_monitoring" as const,
        payload: {
          address,
          isWatching: true,
          currentRiskScore: this.riskScore(address),
          patternsDetected: this.history.get(address)?.suspiciousPatternIds ?? [],
          lastUpdate: now,
        },
      }));
  }
}
