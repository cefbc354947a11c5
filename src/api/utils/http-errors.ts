import {
  BadRequestException,
  GatewayTimeoutException,
  HttpException,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InvalidRequestError, NotFoundError, errorMessage } from '../../common/errors/search.errors';
import { RequestDeadlineError } from './request-signal';

/**
 * Maps a failure from the search layer to the HTTP exception Nest should
 * send. A fired signal wins over whatever error the aborted call produced.
 */
export function toHttpException(
  error: unknown,
  logger: Logger,
  context: string,
  signal?: AbortSignal,
): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (signal?.aborted && signal.reason instanceof RequestDeadlineError) {
    logger.warn(`${context}: ${signal.reason.message}`);
    return new GatewayTimeoutException(signal.reason.message);
  }
  if (error instanceof InvalidRequestError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof NotFoundError) {
    return new NotFoundException(error.message);
  }

  logger.error(`${context} failed: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
  return new InternalServerErrorException(`${context} failed`);
}
