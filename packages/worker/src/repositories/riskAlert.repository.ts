import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Alert } from "risk-scoring";
import { Repository } from "typeorm";
import { RiskAlert } from "../entities";

@Injectable()
export class RiskAlertRepository {
  public constructor(@InjectRepository(RiskAlert) private readonly repository: Repository<RiskAlert>) {}

  public async addAlert(alert: Alert, aiApplied: boolean): Promise<void> {
    await this.repository.insert({
      transactionRef: alert.transactionRef,
      sender: alert.sender,
      recipient: alert.recipient,
      amount: alert.amount,
      riskScore: alert.riskScore,
      severity: alert.severity,
      alertKind: alert.alertKind,
      message: alert.message,
      aiApplied,
      occurredAt: new Date(alert.timestamp),
    });
  }

  public async findByAddress(address: string, limit = 50): Promise<RiskAlert[]> {
    return this.repository.find({
      where: [{ sender: address }, { recipient: address }],
      order: { occurredAt: "DESC" },
      take: limit,
    });
  }
}
