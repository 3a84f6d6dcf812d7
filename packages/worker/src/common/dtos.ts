import { ApiProperty } from "@nestjs/swagger";
import { ArrayNotEmpty, IsArray, IsString } from "class-validator";
import { PatternFinding, PatternKind, Severity } from "risk-scoring";

export const AMOUNT_REGEX_PATTERN = "^[0-9]{1,20}$";
export const AMOUNT_REGEX = new RegExp(AMOUNT_REGEX_PATTERN);

export const SEVERITIES: Severity[] = ["low", "medium", "high", "critical"];
export const PATTERN_KINDS: PatternKind[] = [
  "rapid_transactions",
  "large_transfer",
  "unusual_contract",
  "failed_spike",
  "round_amounts",
  "unusual_hours",
  "new_address",
];

export class AddressListDto {
  @ApiProperty({ type: [String], example: ["0xabc0000000000000000000000000000000000001"] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  public readonly addresses!: string[];
}

export class AddressListResultDto {
  @ApiProperty({ type: [String], description: "Addresses whose membership changed" })
  public readonly changed!: string[];
}

export class PatternFindingDto {
  @ApiProperty({ type: String })
  public readonly address!: string;

  @ApiProperty({ enum: PATTERN_KINDS })
  public readonly patternKind!: PatternKind;

  @ApiProperty({ enum: SEVERITIES })
  public readonly severity!: Severity;

  @ApiProperty({ type: String })
  public readonly description!: string;

  @ApiProperty({ type: [String] })
  public readonly evidenceIds!: string[];

  @ApiProperty({ type: Number, minimum: 0, maximum: 100 })
  public readonly scoreContribution!: number;

  @ApiProperty({ type: Number, description: "Milliseconds since epoch" })
  public readonly detectedAt!: number;
}

export function mapFindingToDto(finding: PatternFinding): PatternFindingDto {
  return { ...finding, evidenceIds: [...finding.evidenceIds] };
}
