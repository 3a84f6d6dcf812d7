import { ApiProperty } from "@nestjs/swagger";
import { AddressRecord, PatternKind, RiskLevel, WalletRiskInfo } from "risk-scoring";
import { PATTERN_KINDS, SEVERITIES } from "../../common/dtos";

export class WalletRiskDto {
  @ApiProperty({ type: String })
  public readonly address!: string;

  @ApiProperty({ type: Number, minimum: 0, maximum: 100 })
  public readonly riskScore!: number;

  @ApiProperty({ type: Boolean })
  public readonly isBlacklisted!: boolean;

  @ApiProperty({ type: Boolean })
  public readonly isWhitelisted!: boolean;

  @ApiProperty({ type: Number })
  public readonly transactionCount!: number;

  @ApiProperty({ enum: SEVERITIES })
  public readonly riskLevel!: RiskLevel;
}

export class AddressRecordDto {
  @ApiProperty({ type: String })
  public readonly address!: string;

  @ApiProperty({ type: Number })
  public readonly transactionCount!: number;

  @ApiProperty({ type: String, example: "2000" })
  public readonly totalVolume!: string;

  @ApiProperty({ type: Number })
  public readonly firstSeenAt!: number;

  @ApiProperty({ type: Number })
  public readonly lastTransactionTime!: number;

  @ApiProperty({ type: Number })
  public readonly rapidTransactionCount!: number;

  @ApiProperty({ type: Number })
  public readonly failedTransactionCount!: number;

  @ApiProperty({ type: Number })
  public readonly contractInteractionCount!: number;

  @ApiProperty({ type: Number })
  public readonly riskScore!: number;

  @ApiProperty({ enum: PATTERN_KINDS, isArray: true })
  public readonly suspiciousPatternIds!: PatternKind[];
}

export function mapWalletRiskToDto(info: WalletRiskInfo): WalletRiskDto {
  return { ...info };
}

export function mapAddressRecordToDto(record: AddressRecord): AddressRecordDto {
  return {
    ...record,
    totalVolume: record.totalVolume.toString(),
    suspiciousPatternIds: [...record.suspiciousPatternIds],
  };
}
