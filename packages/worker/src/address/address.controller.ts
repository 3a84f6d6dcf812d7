import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from "@nestjs/common";
import { ApiBadRequestResponse, ApiNotFoundResponse, ApiOkResponse, ApiParam, ApiTags } from "@nestjs/swagger";
import { normalizeAddress } from "risk-scoring";
import { mapFindingToDto, PatternFindingDto } from "../common/dtos";
import { RiskDetectorService } from "../detector/riskDetector.service";
import { RiskAlertRepository } from "../repositories";
import { AnalyzeBatchDto } from "./dtos/analyzeBatch.dto";
import { mapStoredAlertToDto, StoredAlertDto } from "./dtos/riskAlert.dto";
import { AddressRecordDto, mapAddressRecordToDto, mapWalletRiskToDto, WalletRiskDto } from "./dtos/walletRisk.dto";

const entityName = "addresses";

const addressParam = {
  name: "address",
  type: String,
  example: "0xabc0000000000000000000000000000000000001",
  description: "Wallet address; compared case-insensitively",
};

@ApiTags("Addresses")
@Controller(entityName)
export class AddressController {
  constructor(
    private readonly riskDetectorService: RiskDetectorService,
    private readonly riskAlertRepository: RiskAlertRepository
  ) {}

  @Get(":address/risk-score")
  @ApiParam(addressParam)
  @ApiOkResponse({ description: "Cached rule-based risk score; 0 for unseen addresses", type: Number })
  public getRiskScore(@Param("address") address: string): number {
    return this.riskDetectorService.riskScore(address);
  }

  @Get(":address/blacklisted")
  @ApiParam(addressParam)
  @ApiOkResponse({ type: Boolean })
  public getBlacklisted(@Param("address") address: string): boolean {
    return this.riskDetectorService.isBlacklisted(address);
  }

  @Get(":address/whitelisted")
  @ApiParam(addressParam)
  @ApiOkResponse({ type: Boolean })
  public getWhitelisted(@Param("address") address: string): boolean {
    return this.riskDetectorService.isWhitelisted(address);
  }

  @Get(":address/transaction-count")
  @ApiParam(addressParam)
  @ApiOkResponse({ type: Number })
  public getTransactionCount(@Param("address") address: string): number {
    return this.riskDetectorService.transactionCount(address);
  }

  @Get(":address/risk")
  @ApiParam(addressParam)
  @ApiOkResponse({ description: "Risk summary for the address", type: WalletRiskDto })
  public getWalletRisk(@Param("address") address: string): WalletRiskDto {
    return mapWalletRiskToDto(this.riskDetectorService.walletRisk(address));
  }

  @Get(":address/record")
  @ApiParam(addressParam)
  @ApiOkResponse({ description: "Transaction history aggregates", type: AddressRecordDto })
  @ApiNotFoundResponse({ description: "Address has not been observed" })
  public getRecord(@Param("address") address: string): AddressRecordDto {
    const record = this.riskDetectorService.addressRecord(address);
    if (!record) {
      throw new NotFoundException();
    }
    return mapAddressRecordToDto(record);
  }

  @Get(":address/alerts")
  @ApiParam(addressParam)
  @ApiOkResponse({ description: "Most recent stored alerts involving the address", type: [StoredAlertDto] })
  public async getAlerts(@Param("address") address: string): Promise<StoredAlertDto[]> {
    const alerts = await this.riskAlertRepository.findByAddress(normalizeAddress(address));
    return alerts.map(mapStoredAlertToDto);
  }

  @Post(":address/patterns")
  @HttpCode(HttpStatus.OK)
  @ApiParam(addressParam)
  @ApiOkResponse({ description: "Batch-level pattern findings", type: [PatternFindingDto] })
  @ApiBadRequestResponse({ description: "Batch body is not valid" })
  public async analyzeBatch(
    @Param("address") address: string,
    @Body() body: AnalyzeBatchDto
  ): Promise<PatternFindingDto[]> {
    const findings = await this.riskDetectorService.analyzeBatch(
      address,
      body.transactions.map((tx) => ({
        transactionRef: tx.transactionRef,
        amount: BigInt(tx.amount),
        timestamp: tx.timestamp,
      }))
    );
    return findings.map(mapFindingToDto);
  }
}
