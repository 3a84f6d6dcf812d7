import { ApiProperty } from "@nestjs/swagger";
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from "class-validator";
import { TransactionCategory } from "risk-scoring";
import { AMOUNT_REGEX } from "../../common/dtos";

export const TRANSACTION_CATEGORIES: TransactionCategory[] = ["send", "receive", "contract", "approval"];

export class ScoreTransactionDto {
  @ApiProperty({ type: String, required: false, description: "Caller-supplied transaction reference" })
  @IsOptional()
  @IsString()
  public readonly transactionRef?: string;

  @ApiProperty({ type: String, example: "0xabc0000000000000000000000000000000000001" })
  @IsString()
  @IsNotEmpty()
  public readonly sender!: string;

  @ApiProperty({ type: String, example: "0xabc0000000000000000000000000000000000002" })
  @IsString()
  @IsNotEmpty()
  public readonly recipient!: string;

  @ApiProperty({ type: String, example: "2000", description: "Amount in native units as a decimal string" })
  @Matches(AMOUNT_REGEX, { message: "amount must be an unsigned integer string" })
  public readonly amount!: string;

  @ApiProperty({ enum: TRANSACTION_CATEGORIES })
  @IsIn(TRANSACTION_CATEGORIES)
  public readonly category!: TransactionCategory;

  @ApiProperty({ type: Number, required: false, description: "Milliseconds since epoch; defaults to now" })
  @IsOptional()
  @IsInt()
  @Min(0)
  public readonly timestamp?: number;
}

export class RecordFailureDto {
  @ApiProperty({ type: String })
  @IsString()
  @IsNotEmpty()
  public readonly address!: string;

  @ApiProperty({ type: Number, required: false })
  @IsOptional()
  @IsInt()
  @Min(0)
  public readonly timestamp?: number;
}
