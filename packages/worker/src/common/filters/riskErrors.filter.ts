import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from "@nestjs/common";
import { Response } from "express";
import {
  AdminAuthorizationError,
  CounterOverflowError,
  InvalidInputError,
  OracleResponseError,
  OracleTimeoutError,
} from "risk-scoring";

type RiskError =
  | AdminAuthorizationError
  | InvalidInputError
  | CounterOverflowError
  | OracleResponseError
  | OracleTimeoutError;

export function statusForRiskError(error: RiskError): HttpStatus {
  if (error instanceof AdminAuthorizationError) {
    return HttpStatus.FORBIDDEN;
  }
  if (error instanceof InvalidInputError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof OracleResponseError) {
    return HttpStatus.BAD_GATEWAY;
  }
  if (error instanceof OracleTimeoutError) {
    return HttpStatus.GATEWAY_TIMEOUT;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function riskErrorBody(error: RiskError) {
  return {
    statusCode: statusForRiskError(error),
    error: error.name,
    message: error.message,
  };
}

@Catch(AdminAuthorizationError, InvalidInputError, CounterOverflowError, OracleResponseError, OracleTimeoutError)
export class RiskErrorsFilter implements ExceptionFilter<RiskError> {
  private readonly logger = new Logger(RiskErrorsFilter.name);

  public catch(error: RiskError, host: ArgumentsHost) {
    const body = riskErrorBody(error);
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error({ error: error.message, name: error.name }, "Risk engine request failed");
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(body.statusCode).json(body);
  }
}
