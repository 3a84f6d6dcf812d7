import { ApiProperty } from "@nestjs/swagger";
import { Alert, AlertKind, BlendOutcome, Severity } from "risk-scoring";
import { mapFindingToDto, PatternFindingDto, SEVERITIES } from "../../common/dtos";
import { ScoreTransactionResult } from "../../detector/riskDetector.service";

export class AlertDto {
  @ApiProperty({ type: String })
  public readonly transactionRef!: string;

  @ApiProperty({ type: String })
  public readonly sender!: string;

  @ApiProperty({ type: String })
  public readonly recipient!: string;

  @ApiProperty({ type: String, example: "2000" })
  public readonly amount!: string;

  @ApiProperty({ type: Number, minimum: 0, maximum: 100 })
  public readonly riskScore!: number;

  @ApiProperty({ enum: SEVERITIES })
  public readonly severity!: Severity;

  @ApiProperty({ enum: ["security", "warning"] })
  public readonly alertKind!: AlertKind;

  @ApiProperty({ type: String })
  public readonly message!: string;

  @ApiProperty({ type: Number })
  public readonly timestamp!: number;
}

export class BlendOutcomeDto {
  @ApiProperty({ type: Number })
  public readonly score!: number;

  @ApiProperty({ type: Number })
  public readonly ruleScore!: number;

  @ApiProperty({ type: Number, required: false })
  public readonly aiScore?: number;

  @ApiProperty({ type: Number, required: false })
  public readonly aiConfidence?: number;

  @ApiProperty({ type: Boolean })
  public readonly applied!: boolean;

  @ApiProperty({ type: Boolean, description: "The oracle failed or timed out and the rule score was used" })
  public readonly degraded!: boolean;
}

class AiOutcomeDto {
  @ApiProperty({ type: BlendOutcomeDto })
  public readonly sender!: BlendOutcomeDto;

  @ApiProperty({ type: BlendOutcomeDto })
  public readonly recipient!: BlendOutcomeDto;
}

export class ScoreResultDto {
  @ApiProperty({ type: String })
  public readonly transactionRef!: string;

  @ApiProperty({ type: Boolean, description: "False when monitoring is disabled and nothing was recorded" })
  public readonly monitored!: boolean;

  @ApiProperty({ type: Number })
  public readonly senderScore!: number;

  @ApiProperty({ type: Number })
  public readonly recipientScore!: number;

  @ApiProperty({ type: [PatternFindingDto] })
  public readonly findings!: PatternFindingDto[];

  @ApiProperty({ type: AlertDto, required: false, nullable: true })
  public readonly alert!: AlertDto | null;

  @ApiProperty({ type: AiOutcomeDto, required: false, nullable: true })
  public readonly ai!: AiOutcomeDto | null;
}

export function mapAlertToDto(alert: Alert): AlertDto {
  return { ...alert, amount: alert.amount.toString() };
}

function mapOutcome(outcome: BlendOutcome): BlendOutcomeDto {
  return { ...outcome };
}

export function mapScoreResultToDto(result: ScoreTransactionResult): ScoreResultDto {
  return {
    transactionRef: result.transactionRef,
    monitored: result.monitored,
    senderScore: result.senderScore,
    recipientScore: result.recipientScore,
    findings: result.findings.map(mapFindingToDto),
    alert: result.alert ? mapAlertToDto(result.alert) : null,
    ai: result.ai ? { sender: mapOutcome(result.ai.sender), recipient: mapOutcome(result.ai.recipient) } : null,
  };
}
