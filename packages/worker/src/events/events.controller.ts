import { Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ApiOkResponse, ApiTags } from "@nestjs/swagger";
import { RiskDetectorService } from "../detector/riskDetector.service";
import { DrainedEventsDto, mapRiskEventToDto } from "./dtos/riskEvent.dto";
import { RiskEventPublisher } from "./riskEventPublisher.service";

@ApiTags("Events")
@Controller("events")
export class EventsController {
  constructor(
    private readonly riskDetectorService: RiskDetectorService,
    private readonly riskEventPublisher: RiskEventPublisher
  ) {}

  @Post("drain")
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ description: "Queued events, removed from the queue", type: DrainedEventsDto })
  public drain(): DrainedEventsDto {
    const events = this.riskDetectorService.drainEvents().map(mapRiskEventToDto);
    return { events, dropped: this.riskEventPublisher.dropped };
  }
}
