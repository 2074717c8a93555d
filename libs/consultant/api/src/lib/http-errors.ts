import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';
import { ComputationError } from '@business-consultant/metrics/core';
import { GenerationError } from '@business-consultant/consultant/core';

/**
 * Map domain errors onto HTTP responses.
 * Invalid inputs are the caller's fault (400); a failing text-generation
 * backend is an upstream failure (502). Anything else is rethrown as is.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof ComputationError) {
    return new BadRequestException({
      statusCode: HttpStatus.BAD_REQUEST,
      error: error.name,
      message: error.message,
      fields: error.fields,
    });
  }

  if (error instanceof GenerationError) {
    return new HttpException(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: error.name,
        message: error.message,
        provider: error.provider,
      },
      HttpStatus.BAD_GATEWAY,
      { cause: error }
    );
  }

  return error;
}
