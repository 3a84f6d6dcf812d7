import { NotFoundException } from "@nestjs/common";
import { RiskDetectorService } from "../detector/riskDetector.service";
import { RiskAlert } from "../entities";
import { ADMIN } from "../testing/configFixture";
import { createWorkerModule, RepositoryMocks } from "../testing/workerModule";
import { AddressController } from "./address.controller";

const NOON = Date.UTC(2024, 0, 1, 12, 0, 0);

describe("AddressController", () => {
  let controller: AddressController;
  let detector: RiskDetectorService;
  let alertRepository: RepositoryMocks["alertRepository"];

  beforeEach(async () => {
    const worker = await createWorkerModule();
    controller = worker.moduleRef.get(AddressController);
    detector = worker.moduleRef.get(RiskDetectorService);
    alertRepository = worker.alertRepository;

    detector.addToBlacklist(ADMIN, ["0xaaa"]);
    await detector.recordAndScore({
      transactionRef: "tx-1",
      sender: "0xaaa",
      recipient: "0xbbb",
      amount: BigInt(2000),
      category: "send",
      now: NOON,
    });
  });

  it("answers the single-value queries", () => {
    expect(controller.getRiskScore("0xAAA")).toBe(100);
    expect(controller.getBlacklisted("0xaaa")).toBe(true);
    expect(controller.getWhitelisted("0xaaa")).toBe(false);
    expect(controller.getTransactionCount("0xbbb")).toBe(1);
    expect(controller.getRiskScore("0xunknown")).toBe(0);
  });

  it("summarizes wallet risk", () => {
    expect(controller.getWalletRisk("0xbbb")).toEqual({
      address: "0xbbb",
      riskScore: 25,
      isBlacklisted: false,
      isWhitelisted: false,
      transactionCount: 1,
      riskLevel: "low",
    });
  });

  it("returns the history record", () => {
    expect(controller.getRecord("0xaaa")).toMatchObject({ transactionCount: 1, totalVolume: "2000", riskScore: 100 });
    expect(() => controller.getRecord("0xunknown")).toThrow(NotFoundException);
  });

  it("lists stored alerts for the normalized address", async () => {
    const stored: Partial<RiskAlert> = {
      transactionRef: "tx-1",
      sender: "0xaaa",
      recipient: "0xbbb",
      amount: BigInt(2000),
      riskScore: 100,
      severity: "critical",
      alertKind: "security",
      message: "High-risk transaction: sender scored 100/100",
      aiApplied: false,
      occurredAt: new Date(NOON),
    };
    alertRepository.findByAddress.mockResolvedValue([stored]);

    expect(await controller.getAlerts("0xAAA")).toEqual([{ ...stored, amount: "2000" }]);
    expect(alertRepository.findByAddress).toHaveBeenCalledWith("0xaaa");
  });

  it("runs batch rules", async () => {
    const findings = await controller.analyzeBatch("0xeee", {
      transactions: [
        { transactionRef: "b-1", amount: "20000", timestamp: NOON },
        { transactionRef: "b-2", amount: "5", timestamp: NOON },
      ],
    });

    expect(findings.map((finding) => [finding.patternKind, finding.severity, finding.evidenceIds])).toEqual([
      ["large_transfer", "critical", ["b-1"]],
      ["new_address", "medium", ["b-1"]],
    ]);
  });
});
