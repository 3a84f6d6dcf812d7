import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { ArrayNotEmpty, IsArray, IsInt, IsNotEmpty, IsString, Matches, Min, ValidateNested } from "class-validator";
import { AMOUNT_REGEX } from "../../common/dtos";

export class BatchTransactionDto {
  @ApiProperty({ type: String })
  @IsString()
  @IsNotEmpty()
  public readonly transactionRef!: string;

  @ApiProperty({ type: String, example: "15000" })
  @Matches(AMOUNT_REGEX, { message: "amount must be an unsigned integer string" })
  public readonly amount!: string;

  @ApiProperty({ type: Number })
  @IsInt()
  @Min(0)
  public readonly timestamp!: number;
}

export class AnalyzeBatchDto {
  @ApiProperty({ type: [BatchTransactionDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => BatchTransactionDto)
  public readonly transactions!: BatchTransactionDto[];
}
