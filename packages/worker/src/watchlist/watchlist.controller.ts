import { Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from "@nestjs/common";
import { ApiOkResponse, ApiParam, ApiProperty, ApiTags } from "@nestjs/swagger";
import { normalizeAddress } from "risk-scoring";
import { RiskDetectorService } from "../detector/riskDetector.service";

export class WatchResultDto {
  @ApiProperty({ type: String })
  public readonly address!: string;

  @ApiProperty({ type: Boolean })
  public readonly isWatching!: boolean;

  @ApiProperty({ type: Boolean, description: "Whether the call changed the watch list" })
  public readonly changed!: boolean;
}

@ApiTags("Watch list")
@Controller("watchlist")
export class WatchlistController {
  constructor(private readonly riskDetectorService: RiskDetectorService) {}

  @Get()
  @ApiOkResponse({ type: [String] })
  public getWatched(): string[] {
    return this.riskDetectorService.watchedAddresses();
  }

  @Post(":address")
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: "address", type: String })
  @ApiOkResponse({ type: WatchResultDto })
  public watch(@Param("address") address: string): WatchResultDto {
    const changed = this.riskDetectorService.watch(address);
    return { address: normalizeAddress(address), isWatching: true, changed };
  }

  @Delete(":address")
  @ApiParam({ name: "address", type: String })
  @ApiOkResponse({ type: WatchResultDto })
  public unwatch(@Param("address") address: string): WatchResultDto {
    const changed = this.riskDetectorService.unwatch(address);
    return { address: normalizeAddress(address), isWatching: false, changed };
  }
}
