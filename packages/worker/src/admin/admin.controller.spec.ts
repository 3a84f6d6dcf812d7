import { AdminAuthorizationError, InvalidInputError } from "risk-scoring";
import { ADMIN } from "../testing/configFixture";
import { createWorkerModule } from "../testing/workerModule";
import { AdminController } from "./admin.controller";
import { ThresholdsDto } from "./dtos/thresholds.dto";

const defaults: ThresholdsDto = {
  rapidTransactionWindowMs: 300000,
  largeTransferCutoff: "1000",
  failedTransactionCutoff: 3,
  contractInteractionRatioCutoffPct: 70,
  roundAmountClusterCutoff: 5,
  roundAmountUnit: "10",
  unusualHourStart: 2,
  unusualHourWindow: 6,
  newAddressMaxTransactions: 1,
};

describe("AdminController", () => {
  let controller: AdminController;

  beforeEach(async () => {
    const { moduleRef } = await createWorkerModule();
    controller = moduleRef.get(AdminController);
  });

  it("reads thresholds with string amounts", () => {
    expect(controller.getThresholds()).toEqual(defaults);
  });

  it("replaces thresholds for the admin", () => {
    const updated = controller.setThresholds(ADMIN, { ...defaults, largeTransferCutoff: "5000" });

    expect(updated.largeTransferCutoff).toBe("5000");
    expect(controller.getThresholds().largeTransferCutoff).toBe("5000");
  });

  it("rejects a missing caller header", () => {
    expect(() => controller.setThresholds(undefined, defaults)).toThrow(AdminAuthorizationError);
  });

  it("rejects thresholds the engine cannot use", () => {
    expect(() => controller.setThresholds(ADMIN, { ...defaults, roundAmountUnit: "0" })).toThrow(InvalidInputError);
  });

  it("manages the AI configuration", () => {
    const config = { enabled: true, aiWeightPct: 40, confidenceFloorPct: 60, maxWaitMs: 2000, fallbackOnFailure: false };

    expect(controller.setAiConfig(ADMIN, config)).toEqual(config);
    expect(controller.getAiConfig()).toEqual(config);
  });

  it("toggles monitoring", () => {
    expect(controller.setMonitoring(ADMIN, { enabled: false })).toEqual({ enabled: false });
    expect(controller.getMonitoring()).toEqual({ enabled: false });
  });

  it("maintains the registry lists", () => {
    expect(controller.addToBlacklist(ADMIN, { addresses: ["0xAAA", "0xbbb"] })).toEqual({ changed: ["0xaaa", "0xbbb"] });
    expect(controller.removeFromBlacklist(ADMIN, { addresses: ["0xbbb"] })).toEqual({ changed: ["0xbbb"] });
    expect(controller.addToWhitelist(ADMIN, { addresses: ["0xccc"] })).toEqual({ changed: ["0xccc"] });
    expect(controller.removeFromWhitelist(ADMIN, { addresses: ["0xddd"] })).toEqual({ changed: [] });
  });

  it("rejects registry changes from other callers", () => {
    expect(() => controller.addToBlacklist("0xintruder", { addresses: ["0xaaa"] })).toThrow(AdminAuthorizationError);
  });

  it("exposes the administrator address", () => {
    expect(controller.getAdmin()).toBe(ADMIN);
  });
});
