export type OperationFailureStatus =
  | 'invalid_input'
  | 'duplicate'
  | 'not_found'
  | 'unavailable';

export type OperationSuccess<T> = {
  status: 'ok';
  value: T;
  message: string;
};

export type OperationFailure = {
  status: OperationFailureStatus;
  message: string;
};

export type OperationResult<T = void> = OperationSuccess<T> | OperationFailure;

export function succeed<T>(value: T, message = ''): OperationSuccess<T> {
  return { status: 'ok', value, message };
}

export function fail(
  status: OperationFailureStatus,
  message: string,
): OperationFailure {
  return { status, message };
}

export function isFailure<T>(
  result: OperationResult<T>,
): result is OperationFailure {
  return result.status !== 'ok';
}
