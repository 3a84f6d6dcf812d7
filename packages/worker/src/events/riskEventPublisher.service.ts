import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Alert, PatternFinding, RiskEvent, RiskEventQueue } from "risk-scoring";
import { DetectorConfig } from "../config";
import { PatternFindingRepository, RiskAlertRepository } from "../repositories";

export interface PublishBatch {
  transactionRef?: string;
  events: RiskEvent[];
  alert?: Alert;
  aiApplied?: boolean;
  findings: PatternFinding[];
}

/**
 * Fans scoring results out to the in-memory queue and to storage. Losing a
 * notification never undoes the decision that produced it.
 */
@Injectable()
export class RiskEventPublisher {
  private readonly logger = new Logger(RiskEventPublisher.name);
  private readonly queue: RiskEventQueue;

  public constructor(
    configService: ConfigService,
    private readonly alertRepository: RiskAlertRepository,
    private readonly findingRepository: PatternFindingRepository
  ) {
    const detector = configService.get<DetectorConfig>("detector");
    this.queue = new RiskEventQueue(detector?.eventQueueCapacity);
  }

  public async publish(batch: PublishBatch): Promise<void> {
    const droppedBefore = this.queue.dropped;
    this.queue.push(...batch.events);
    if (this.queue.dropped > droppedBefore) {
      this.logger.warn({ dropped: this.queue.dropped - droppedBefore }, "Risk event queue full; oldest events dropped");
    }

    try {
      if (batch.alert) {
        await this.alertRepository.addAlert(batch.alert, batch.aiApplied ?? false);
      }
      await this.findingRepository.addFindings(batch.findings, batch.transactionRef);
    } catch (error) {
      this.logger.error(
        {
          transactionRef: batch.transactionRef,
          error: error instanceof Error ? error.message : String(error),
        },
        "Failed to persist risk events"
      );
    }
  }

  public drain(): RiskEvent[] {
    return this.queue.drain();
  }

  public get pending(): number {
    return this.queue.size;
  }

  public get dropped(): number {
    return this.queue.dropped;
  }
}
