import { Test } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { Alert, PatternFinding, RiskEvent } from "risk-scoring";
import { PatternFindingRepository, RiskAlertRepository } from "../repositories";
import { buildConfigService } from "../testing/configFixture";
import { RiskEventPublisher } from "./riskEventPublisher.service";

const alert: Alert = {
  transactionRef: "tx-1",
  sender: "0xaaa",
  recipient: "0xbbb",
  amount: BigInt(2000),
  riskScore: 100,
  severity: "critical",
  alertKind: "security",
  message: "High-risk transaction: sender scored 100/100",
  timestamp: 0,
};

const finding: PatternFinding = {
  address: "0xaaa",
  patternKind: "failed_spike",
  severity: "medium",
  description: "4 failed transactions recorded",
  evidenceIds: [],
  scoreContribution: 60,
  detectedAt: 0,
};

const monitoringEvent = (address: string): RiskEvent => ({
  type: "wallet_monitoring",
  payload: { address, isWatching: true, currentRiskScore: 0, patternsDetected: [], lastUpdate: 0 },
});

describe("RiskEventPublisher", () => {
  let publisher: RiskEventPublisher;
  let alertRepository: { addAlert: jest.Mock; findByAddress: jest.Mock };
  let findingRepository: { addFindings: jest.Mock };

  beforeEach(async () => {
    alertRepository = { addAlert: jest.fn().mockResolvedValue(undefined), findByAddress: jest.fn() };
    findingRepository = { addFindings: jest.fn().mockResolvedValue(undefined) };

    const moduleRef = await Test.createTestingModule({
      providers: [
        RiskEventPublisher,
        { provide: ConfigService, useValue: buildConfigService({ detector: { eventQueueCapacity: 2 } }) },
        { provide: RiskAlertRepository, useValue: alertRepository },
        { provide: PatternFindingRepository, useValue: findingRepository },
      ],
    }).compile();

    publisher = moduleRef.get(RiskEventPublisher);
  });

  it("queues events and persists alerts and findings", async () => {
    const events: RiskEvent[] = [
      { type: "alert", payload: alert },
      { type: "pattern_finding", payload: finding },
    ];

    await publisher.publish({ transactionRef: "tx-1", events, alert, aiApplied: true, findings: [finding] });

    expect(alertRepository.addAlert).toHaveBeenCalledWith(alert, true);
    expect(findingRepository.addFindings).toHaveBeenCalledWith([finding], "tx-1");
    expect(publisher.pending).toBe(2);
    expect(publisher.drain()).toEqual(events);
    expect(publisher.pending).toBe(0);
  });

  it("skips the alert table when there is no alert", async () => {
    await publisher.publish({ events: [], findings: [] });

    expect(alertRepository.addAlert).not.toHaveBeenCalled();
    expect(findingRepository.addFindings).toHaveBeenCalledWith([], undefined);
  });

  it("counts events dropped from a full queue", async () => {
    await publisher.publish({
      events: [monitoringEvent("0x1"), monitoringEvent("0x2"), monitoringEvent("0x3")],
      findings: [],
    });

    expect(publisher.dropped).toBe(1);
    expect(publisher.drain()).toEqual([monitoringEvent("0x2"), monitoringEvent("0x3")]);
  });

  it("keeps queued events when storage fails", async () => {
    alertRepository.addAlert.mockRejectedValue(new Error("connection terminated"));

    await expect(
      publisher.publish({ events: [{ type: "alert", payload: alert }], alert, findings: [] })
    ).resolves.toBeUndefined();
    expect(publisher.drain()).toEqual([{ type: "alert", payload: alert }]);
  });
});
