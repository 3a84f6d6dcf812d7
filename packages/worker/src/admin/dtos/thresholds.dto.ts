import { ApiProperty } from "@nestjs/swagger";
import { IsInt, Matches, Max, Min } from "class-validator";
import { RiskThresholds } from "risk-scoring";
import { AMOUNT_REGEX } from "../../common/dtos";

export class ThresholdsDto {
  @ApiProperty({ type: Number, example: 300000 })
  @IsInt()
  @Min(0)
  public readonly rapidTransactionWindowMs!: number;

  @ApiProperty({ type: String, example: "1000" })
  @Matches(AMOUNT_REGEX, { message: "largeTransferCutoff must be an unsigned integer string" })
  public readonly largeTransferCutoff!: string;

  @ApiProperty({ type: Number, example: 3 })
  @IsInt()
  @Min(0)
  public readonly failedTransactionCutoff!: number;

  @ApiProperty({ type: Number, example: 70, minimum: 0, maximum: 100 })
  @IsInt()
  @Min(0)
  @Max(100)
  public readonly contractInteractionRatioCutoffPct!: number;

  @ApiProperty({ type: Number, example: 5 })
  @IsInt()
  @Min(0)
  public readonly roundAmountClusterCutoff!: number;

  @ApiProperty({ type: String, example: "10" })
  @Matches(AMOUNT_REGEX, { message: "roundAmountUnit must be an unsigned integer string" })
  public readonly roundAmountUnit!: string;

  @ApiProperty({ type: Number, example: 2, minimum: 0, maximum: 24 })
  @IsInt()
  @Min(0)
  @Max(24)
  public readonly unusualHourStart!: number;

  @ApiProperty({ type: Number, example: 6, minimum: 0, maximum: 24, description: "Exclusive end hour (UTC)" })
  @IsInt()
  @Min(0)
  @Max(24)
  public readonly unusualHourWindow!: number;

  @ApiProperty({ type: Number, example: 1 })
  @IsInt()
  @Min(0)
  public readonly newAddressMaxTransactions!: number;
}

export function mapThresholdsFromDto(dto: ThresholdsDto): RiskThresholds {
  return {
    ...dto,
    largeTransferCutoff: BigInt(dto.largeTransferCutoff),
    roundAmountUnit: BigInt(dto.roundAmountUnit),
  };
}

export function mapThresholdsToDto(thresholds: RiskThresholds): ThresholdsDto {
  return {
    ...thresholds,
    largeTransferCutoff: thresholds.largeTransferCutoff.toString(),
    roundAmountUnit: thresholds.roundAmountUnit.toString(),
  };
}
