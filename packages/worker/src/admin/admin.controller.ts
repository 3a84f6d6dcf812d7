import { Body, Controller, Delete, Get, Headers, HttpCode, HttpStatus, Post, Put } from "@nestjs/common";
import {
  ApiBadRequestResponse,
  ApiForbiddenResponse,
  ApiHeader,
  ApiOkResponse,
  ApiTags,
} from "@nestjs/swagger";
import { AddressListDto, AddressListResultDto } from "../common/dtos";
import { RiskDetectorService } from "../detector/riskDetector.service";
import { AiConfigDto, MonitoringDto } from "./dtos/aiConfig.dto";
import { mapThresholdsFromDto, mapThresholdsToDto, ThresholdsDto } from "./dtos/thresholds.dto";

export const CALLER_HEADER = "x-caller-address";

const callerHeader = {
  name: CALLER_HEADER,
  required: true,
  description: "Address of the caller; must match the configured administrator",
};

@ApiTags("Admin")
@Controller("admin")
export class AdminController {
  constructor(private readonly riskDetectorService: RiskDetectorService) {}

  @Get("thresholds")
  @ApiOkResponse({ type: ThresholdsDto })
  public getThresholds(): ThresholdsDto {
    return mapThresholdsToDto(this.riskDetectorService.getThresholds());
  }

  @Put("thresholds")
  @ApiHeader(callerHeader)
  @ApiOkResponse({ description: "Thresholds replaced", type: ThresholdsDto })
  @ApiBadRequestResponse({ description: "Thresholds are out of range" })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public setThresholds(@Headers(CALLER_HEADER) caller: string | undefined, @Body() body: ThresholdsDto): ThresholdsDto {
    return mapThresholdsToDto(this.riskDetectorService.setThresholds(caller ?? "", mapThresholdsFromDto(body)));
  }

  @Get("ai-config")
  @ApiOkResponse({ type: AiConfigDto })
  public getAiConfig(): AiConfigDto {
    return this.riskDetectorService.getAiConfig();
  }

  @Put("ai-config")
  @ApiHeader(callerHeader)
  @ApiOkResponse({ description: "AI blend configuration replaced", type: AiConfigDto })
  @ApiBadRequestResponse({ description: "Configuration is out of range" })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public setAiConfig(@Headers(CALLER_HEADER) caller: string | undefined, @Body() body: AiConfigDto): AiConfigDto {
    return this.riskDetectorService.setAiConfig(caller ?? "", { ...body });
  }

  @Get("monitoring")
  @ApiOkResponse({ type: MonitoringDto })
  public getMonitoring(): MonitoringDto {
    return { enabled: this.riskDetectorService.isMonitoringEnabled() };
  }

  @Put("monitoring")
  @ApiHeader(callerHeader)
  @ApiOkResponse({ type: MonitoringDto })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public setMonitoring(@Headers(CALLER_HEADER) caller: string | undefined, @Body() body: MonitoringDto): MonitoringDto {
    return { enabled: this.riskDetectorService.setMonitoringEnabled(caller ?? "", body.enabled) };
  }

  @Post("blacklist")
  @HttpCode(HttpStatus.OK)
  @ApiHeader(callerHeader)
  @ApiOkResponse({ type: AddressListResultDto })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public addToBlacklist(
    @Headers(CALLER_HEADER) caller: string | undefined,
    @Body() body: AddressListDto
  ): AddressListResultDto {
    return { changed: this.riskDetectorService.addToBlacklist(caller ?? "", body.addresses) };
  }

  @Delete("blacklist")
  @ApiHeader(callerHeader)
  @ApiOkResponse({ type: AddressListResultDto })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public removeFromBlacklist(
    @Headers(CALLER_HEADER) caller: string | undefined,
    @Body() body: AddressListDto
  ): AddressListResultDto {
    return { changed: this.riskDetectorService.removeFromBlacklist(caller ?? "", body.addresses) };
  }

  @Post("whitelist")
  @HttpCode(HttpStatus.OK)
  @ApiHeader(callerHeader)
  @ApiOkResponse({ type: AddressListResultDto })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public addToWhitelist(
    @Headers(CALLER_HEADER) caller: string | undefined,
    @Body() body: AddressListDto
  ): AddressListResultDto {
    return { changed: this.riskDetectorService.addToWhitelist(caller ?? "", body.addresses) };
  }

  @Delete("whitelist")
  @ApiHeader(callerHeader)
  @ApiOkResponse({ type: AddressListResultDto })
  @ApiForbiddenResponse({ description: "Caller is not the administrator" })
  public removeFromWhitelist(
    @Headers(CALLER_HEADER) caller: string | undefined,
    @Body() body: AddressListDto
  ): AddressListResultDto {
    return { changed: this.riskDetectorService.removeFromWhitelist(caller ?? "", body.addresses) };
  }

  @Get("admin-address")
  @ApiOkResponse({ description: "Configured administrator address; empty when unset", type: String })
  public getAdmin(): string {
    return this.riskDetectorService.admin;
  }
}
