/** Error codes for store-level rejections */
export type StateStoreErrorCode =
  | 'INVALID_DEVICE_NAME'
  | 'STORE_UNAVAILABLE'
  | 'WRITE_FAILED';

/** Domain error for the state store and its coordinator */
export class StateStoreError extends Error {
  constructor(public readonly code: StateStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateStoreError';
  }
}
