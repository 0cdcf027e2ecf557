export type CoordinatorErrorCode =
  | 'CONFIG_INVALID'
  | 'BRIDGE_ALREADY_STARTED'
  | 'BRIDGE_DESTROYED';

export class CoordinatorError<C extends CoordinatorErrorCode = CoordinatorErrorCode> extends Error {
  readonly code: C;
  readonly detail?: readonly string[];

  constructor(code: C, message: string, detail?: readonly string[]) {
    super(detail === undefined || detail.length === 0 ? message : `${message} ${detail.join('; ')}`);
    this.name = 'CoordinatorError';
    this.code = code;
    if (detail !== undefined) {
      this.detail = detail;
    }
  }
}

export function isCoordinatorError(value: unknown): value is CoordinatorError {
  return value instanceof CoordinatorError;
}
