import {
  BadRequestException,
  BadGatewayException,
  HttpException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import {
  ApiRequestError,
  ApiResponseError,
  InvalidArgumentError,
} from '../common/errors/ledger.errors';

/**
 * Maps a client failure to the HttpException a controller should surface.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof InvalidArgumentError) {
    return new BadRequestException({
      success: false,
      error: error.message,
    });
  }
  if (error instanceof ApiRequestError && error.status === HttpStatus.NOT_FOUND) {
    return new NotFoundException({
      success: false,
      error: error.message,
    });
  }
  if (error instanceof ApiRequestError || error instanceof ApiResponseError) {
    return new BadGatewayException({
      success: false,
      error: error.message,
    });
  }
  return new HttpException(
    {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}
