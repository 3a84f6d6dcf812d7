import { ApiProperty } from "@nestjs/swagger";
import { AlertKind, Severity } from "risk-scoring";
import { SEVERITIES } from "../../common/dtos";
import { RiskAlert } from "../../entities";

export class StoredAlertDto {
  @ApiProperty({ type: String })
  public readonly transactionRef!: string;

  @ApiProperty({ type: String })
  public readonly sender!: string;

  @ApiProperty({ type: String })
  public readonly recipient!: string;

  @ApiProperty({ type: String })
  public readonly amount!: string;

  @ApiProperty({ type: Number })
  public readonly riskScore!: number;

  @ApiProperty({ enum: SEVERITIES })
  public readonly severity!: Severity;

  @ApiProperty({ enum: ["security", "warning"] })
  public readonly alertKind!: AlertKind;

  @ApiProperty({ type: String })
  public readonly message!: string;

  @ApiProperty({ type: Boolean })
  public readonly aiApplied!: boolean;

  @ApiProperty({ type: Date })
  public readonly occurredAt!: Date;
}

export function mapStoredAlertToDto(alert: RiskAlert): StoredAlertDto {
  return {
    transactionRef: alert.transactionRef,
    sender: alert.sender,
    recipient: alert.recipient,
    amount: alert.amount.toString(),
    riskScore: alert.riskScore,
    severity: alert.severity,
    alertKind: alert.alertKind,
    message: alert.message,
    aiApplied: alert.aiApplied,
    occurredAt: alert.occurredAt,
  };
}
