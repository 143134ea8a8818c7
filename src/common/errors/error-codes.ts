export enum ErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  API_KEY_INVALID = 'API_KEY_INVALID',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',

  DATA_STORE_ERROR = 'DATA_STORE_ERROR',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  DELIVERY_BOY_NOT_FOUND = 'DELIVERY_BOY_NOT_FOUND',

  CHAT_NOT_CONFIGURED = 'CHAT_NOT_CONFIGURED',
  LLM_REQUEST_FAILED = 'LLM_REQUEST_FAILED',

  WEBHOOK_NOT_CONFIGURED = 'WEBHOOK_NOT_CONFIGURED',
  WEBHOOK_DELIVERY_FAILED = 'WEBHOOK_DELIVERY_FAILED',

  STRIPE_SIGNATURE_INVALID = 'STRIPE_SIGNATURE_INVALID',
  STRIPE_EVENT_INVALID = 'STRIPE_EVENT_INVALID',
}

const STATUS_CODES: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_FAILED,
  401: ErrorCode.API_KEY_INVALID,
  404: ErrorCode.NOT_FOUND,
  429: ErrorCode.RATE_LIMITED,
};

export function errorCodeForStatus(status: number): ErrorCode {
  return STATUS_CODES[status] ?? ErrorCode.INTERNAL_ERROR;
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && (Object.values(ErrorCode) as string[]).includes(value);
}
