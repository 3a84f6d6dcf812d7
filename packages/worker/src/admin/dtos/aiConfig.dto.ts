import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean, IsInt, Max, Min } from "class-validator";

export class AiConfigDto {
  @ApiProperty({ type: Boolean })
  @IsBoolean()
  public readonly enabled!: boolean;

  @ApiProperty({ type: Number, minimum: 0, maximum: 100, example: 30 })
  @IsInt()
  @Min(0)
  @Max(100)
  public readonly aiWeightPct!: number;

  @ApiProperty({ type: Number, minimum: 0, maximum: 100, example: 70 })
  @IsInt()
  @Min(0)
  @Max(100)
  public readonly confidenceFloorPct!: number;

  @ApiProperty({ type: Number, minimum: 1, example: 5000 })
  @IsInt()
  @Min(1)
  public readonly maxWaitMs!: number;

  @ApiProperty({ type: Boolean })
  @IsBoolean()
  public readonly fallbackOnFailure!: boolean;
}

export class MonitoringDto {
  @ApiProperty({ type: Boolean })
  @IsBoolean()
  public readonly enabled!: boolean;
}
