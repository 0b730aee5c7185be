export class AppError extends Error {
  constructor(
    public message: string,
    public code?: string,
    public statusCode = 500,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 'NOT_FOUND', 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class TemplateError extends AppError {
  constructor(message: string) {
    super(message, 'TEMPLATE_ERROR', 500);
    Object.setPrototypeOf(this, TemplateError.prototype);
  }
}

export class StaticAssetError extends AppError {
  constructor(message: string) {
    super(message, 'STATIC_ASSET_ERROR', 500);
    Object.setPrototypeOf(this, StaticAssetError.prototype);
  }
}

export type AdminErrorCode =
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'NO_RESPONSE'
  | 'ENCODE_FAILED'
  | 'INVALID_JSON'
  | 'INCOMPLETE_RESPONSE'
  | 'RESPONSE_TOO_LARGE'
  | 'UNSUCCESSFUL'
  | 'MALFORMED_RESPONSE';

const ADMIN_ERROR_MESSAGES: Record<AdminErrorCode, string> = {
  CONNECTION_FAILED: 'Unable to connect to the admin socket',
  TIMEOUT: 'Timed out waiting for the admin socket',
  NO_RESPONSE: 'No response from admin socket',
  ENCODE_FAILED: 'Unable to encode the admin request',
  INVALID_JSON: 'Unable to decode the admin response',
  INCOMPLETE_RESPONSE: 'The admin socket closed in the middle of its response',
  RESPONSE_TOO_LARGE: 'The admin response was too large',
  UNSUCCESSFUL: 'Non-successful response',
  MALFORMED_RESPONSE: 'Unexpected response from admin socket',
};

/**
 * Failure talking to the admin socket. `message` is safe to show to a user;
 * `detail` carries the underlying cause for the logs.
 */
export class AdminError extends AppError {
  declare code: AdminErrorCode;

  constructor(
    code: AdminErrorCode,
    public detail?: string
  ) {
    super(ADMIN_ERROR_MESSAGES[code], code, 502);
    Object.setPrototypeOf(this, AdminError.prototype);
  }
}
