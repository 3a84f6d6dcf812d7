import { HttpStatus } from "@nestjs/common";
import {
  AdminAuthorizationError,
  CounterOverflowError,
  InvalidInputError,
  OracleResponseError,
  OracleTimeoutError,
} from "risk-scoring";
import { riskErrorBody, statusForRiskError } from "./riskErrors.filter";

describe("statusForRiskError", () => {
  it("maps engine errors to HTTP statuses", () => {
    expect(statusForRiskError(new AdminAuthorizationError("0xintruder"))).toBe(HttpStatus.FORBIDDEN);
    expect(statusForRiskError(new InvalidInputError("aiWeightPct", "must be between 0 and 100"))).toBe(
      HttpStatus.BAD_REQUEST
    );
    expect(statusForRiskError(new CounterOverflowError("0xaaa", "totalVolume"))).toBe(
      HttpStatus.INTERNAL_SERVER_ERROR
    );
    expect(statusForRiskError(new OracleResponseError("bad reply"))).toBe(HttpStatus.BAD_GATEWAY);
    expect(statusForRiskError(new OracleTimeoutError(5000))).toBe(HttpStatus.GATEWAY_TIMEOUT);
  });
});

describe("riskErrorBody", () => {
  it("describes the error for the response", () => {
    expect(riskErrorBody(new AdminAuthorizationError("0xintruder"))).toEqual({
      statusCode: 403,
      error: "AdminAuthorizationError",
      message: "Caller 0xintruder is not the configured administrator",
    });
  });
});
