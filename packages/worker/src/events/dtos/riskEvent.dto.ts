import { ApiProperty } from "@nestjs/swagger";
import { RiskEvent } from "risk-scoring";

export type RiskEventDto =
  | { type: "alert"; payload: Record<string, unknown> }
  | { type: "pattern_finding"; payload: Record<string, unknown> }
  | { type: "transaction_analysis"; payload: Record<string, unknown> }
  | { type: "wallet_monitoring"; payload: Record<string, unknown> };

export class DrainedEventsDto {
  @ApiProperty({
    type: "array",
    items: { type: "object" },
    description: "Queued events in publication order; amounts are decimal strings",
  })
  public readonly events!: RiskEventDto[];

  @ApiProperty({ type: Number, description: "Events dropped because the queue was full since startup" })
  public readonly dropped!: number;
}

export function mapRiskEventToDto(event: RiskEvent): RiskEventDto {
  switch (event.type) {
    case "alert":
      return { type: event.type, payload: { ...event.payload, amount: event.payload.amount.toString() } };
    case "transaction_analysis":
      return { type: event.type, payload: { ...event.payload, amount: event.payload.amount.toString() } };
    case "pattern_finding":
      return { type: event.type, payload: { ...event.payload } };
    case "wallet_monitoring":
      return { type: event.type, payload: { ...event.payload } };
  }
}
