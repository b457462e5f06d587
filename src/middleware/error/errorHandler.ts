import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { LoggingService, LogLevel } from "../../services/logging/LoggingService";
import { CoachError, ErrorCodes } from "../../utils/error";

const STATUS_BY_CODE: Partial<Record<ErrorCodes, number>> = {
  [ErrorCodes.CALL_NOT_ACTIVE]: 404,
  [ErrorCodes.INVALID_BRIEF]: 400,
  [ErrorCodes.INVALID_SEGMENT]: 400,
  [ErrorCodes.EMPTY_SEGMENT]: 400,
};

export interface ErrorResponse {
  status: number;
  body: {
    error: {
      message: string;
      code: string;
      details?: unknown;
    };
  };
}

export function toErrorResponse(error: Error): ErrorResponse {
  // Handle validation errors
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          message: "Validation error",
          code: "VALIDATION_ERROR",
          details: error.errors,
        },
      },
    };
  }

  if (error instanceof CoachError) {
    return {
      status: STATUS_BY_CODE[error.code] ?? 500,
      body: { error: { message: error.message, code: error.code } },
    };
  }

  // Handle unknown errors
  return {
    status: 500,
    body: {
      error: {
        message: "Internal server error",
        code: "INTERNAL_SERVER_ERROR",
      },
    },
  };
}

export const errorHandler = (
  error: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) => {
  const { status, body } = toErrorResponse(error);

  if (status >= 500) {
    const logger = LoggingService.getInstance();
    if (error instanceof CoachError) {
      logger.error(error, "errorHandler");
    } else {
      logger.log(LogLevel.ERROR, error.message, "errorHandler", {
        name: error.name,
        stack: error.stack,
      });
    }
  }

  res.status(status).json(body);
};
