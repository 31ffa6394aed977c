/**
 * Email Error Taxonomy
 *
 * Classifies nodemailer/SMTP failures into stable codes for logging.
 * Notification failures never reach API callers, so there is no HTTP status here.
 */

export type EmailErrorCategory = 'CONFIG' | 'SMTP' | 'NETWORK' | 'TIMEOUT' | 'UNKNOWN';

export interface EmailErrorSpec {
  code: string;
  category: EmailErrorCategory;
}

export const EMAIL_ERRORS = {
  CONFIG_INCOMPLETE: { code: 'EMAIL_CONFIG_INCOMPLETE', category: 'CONFIG' },
  SMTP_AUTH_FAILED: { code: 'SMTP_AUTH_FAILED', category: 'SMTP' },
  SMTP_RECIPIENT_REJECTED: { code: 'SMTP_RECIPIENT_REJECTED', category: 'SMTP' },
  SMTP_MESSAGE_REJECTED: { code: 'SMTP_MESSAGE_REJECTED', category: 'SMTP' },
  DNS_LOOKUP_FAILED: { code: 'EMAIL_DNS_LOOKUP_FAILED', category: 'NETWORK' },
  CONNECTION_REFUSED: { code: 'EMAIL_CONNECTION_REFUSED', category: 'NETWORK' },
  CONNECTION_RESET: { code: 'EMAIL_CONNECTION_RESET', category: 'NETWORK' },
  CONNECT_TIMEOUT: { code: 'EMAIL_CONNECT_TIMEOUT', category: 'TIMEOUT' },
  SEND_TIMEOUT: { code: 'EMAIL_SEND_TIMEOUT', category: 'TIMEOUT' },
  UNKNOWN_ERROR: { code: 'EMAIL_UNKNOWN_ERROR', category: 'UNKNOWN' },
} as const satisfies Record<string, EmailErrorSpec>;

interface ErrorFields {
  name: string;
  message: string;
  code: string;
  responseCode?: number;
}

function readErrorFields(error: unknown): ErrorFields {
  if (!(error instanceof Error)) {
    return { name: 'NonError', message: String(error), code: '' };
  }

  const rawCode: unknown = Reflect.get(error, 'code');
  const rawResponseCode: unknown = Reflect.get(error, 'responseCode');

  return {
    name: error.name,
    message: error.message,
    code: typeof rawCode === 'string' ? rawCode.toUpperCase() : typeof rawCode === 'number' ? String(rawCode) : '',
    responseCode: typeof rawResponseCode === 'number' ? rawResponseCode : undefined,
  };
}

/**
 * Classify an error from nodemailer into our taxonomy
 */
export function classifyEmailError(error: unknown): EmailErrorSpec {
  const { message, code } = readErrorFields(error);
  const errorMessage = message.toLowerCase();

  if (code === 'EAUTH' || errorMessage.includes('authentication failed') || errorMessage.includes('invalid login')) {
    return EMAIL_ERRORS.SMTP_AUTH_FAILED;
  }
  if (code === 'EENVELOPE' || errorMessage.includes('recipient rejected')) {
    return EMAIL_ERRORS.SMTP_RECIPIENT_REJECTED;
  }
  if (code === 'EMESSAGE' || errorMessage.includes('message rejected')) {
    return EMAIL_ERRORS.SMTP_MESSAGE_REJECTED;
  }
  if (code === 'ENOTFOUND' || errorMessage.includes('getaddrinfo')) {
    return EMAIL_ERRORS.DNS_LOOKUP_FAILED;
  }
  if (code === 'ECONNREFUSED') {
    return EMAIL_ERRORS.CONNECTION_REFUSED;
  }
  if (code === 'ECONNRESET') {
    return EMAIL_ERRORS.CONNECTION_RESET;
  }
  if (code === 'ETIMEDOUT' || errorMessage.includes('connection timeout')) {
    return EMAIL_ERRORS.CONNECT_TIMEOUT;
  }
  if (errorMessage.includes('email send operation timed out')) {
    return EMAIL_ERRORS.SEND_TIMEOUT;
  }
  if (errorMessage.includes('missing configuration')) {
    return EMAIL_ERRORS.CONFIG_INCOMPLETE;
  }

  return EMAIL_ERRORS.UNKNOWN_ERROR;
}

/**
 * Create safe log context from error (no secrets)
 */
export function createSafeErrorContext(error: unknown): Record<string, unknown> {
  const fields = readErrorFields(error);
  const spec = classifyEmailError(error);

  return {
    emailErrorCode: spec.code,
    emailErrorCategory: spec.category,
    errorName: fields.name,
    errorCode: fields.code || undefined,
    errorMessage: fields.message.substring(0, 200),
    ...(fields.responseCode !== undefined && { smtpResponseCode: fields.responseCode }),
  };
}
