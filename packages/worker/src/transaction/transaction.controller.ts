import { Body, Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ApiBadRequestResponse, ApiOkResponse, ApiTags } from "@nestjs/swagger";
import { AddressRecordDto, mapAddressRecordToDto } from "../address/dtos/walletRisk.dto";
import { RiskDetectorService } from "../detector/riskDetector.service";
import { RecordFailureDto, ScoreTransactionDto } from "./dtos/scoreTransaction.dto";
import { mapScoreResultToDto, ScoreResultDto } from "./dtos/scoreResult.dto";

const entityName = "transactions";

@ApiTags("Transactions")
@Controller(entityName)
export class TransactionController {
  constructor(private readonly riskDetectorService: RiskDetectorService) {}

  @Post("score")
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ description: "Transaction was recorded and scored", type: ScoreResultDto })
  @ApiBadRequestResponse({ description: "Transaction body is not valid" })
  public async scoreTransaction(@Body() body: ScoreTransactionDto): Promise<ScoreResultDto> {
    const result = await this.riskDetectorService.recordAndScore({
      transactionRef: body.transactionRef,
      sender: body.sender,
      recipient: body.recipient,
      amount: BigInt(body.amount),
      category: body.category,
      now: body.timestamp,
    });
    return mapScoreResultToDto(result);
  }

  @Post("failures")
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({
    description: "Failed transaction was recorded; empty when monitoring is disabled",
    type: AddressRecordDto,
  })
  @ApiBadRequestResponse({ description: "Failure body is not valid" })
  public recordFailure(@Body() body: RecordFailureDto): AddressRecordDto | null {
    const record = this.riskDetectorService.recordFailedTransaction(body.address, body.timestamp);
    return record ? mapAddressRecordToDto(record) : null;
  }
}
