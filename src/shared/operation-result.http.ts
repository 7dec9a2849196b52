import {
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import type {
  OperationFailure,
  OperationResult,
} from './operation-result';

export function toHttpException(failure: OperationFailure): HttpException {
  switch (failure.status) {
    case 'invalid_input':
      return new BadRequestException(failure.message);
    case 'duplicate':
      return new ConflictException(failure.message);
    case 'not_found':
      return new NotFoundException(failure.message);
    case 'unavailable':
      return new ConflictException(failure.message);
  }
}

/**
 * Returns the value of a successful core operation or throws the matching
 * HTTP exception.
 */
export function unwrapResult<T>(result: OperationResult<T>): T {
  if (result.status === 'ok') {
    return result.value;
  }
  throw toHttpException(result);
}
