import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'HmacFailure':
      return error.cause ? `${error.message}\nCause: ${safeToString(error.cause)}` : error.message;

    case 'Usage':
      return `${error.message}\nUsage: ${error.usage}`;

    case 'MalformedToken':
    case 'DecodeFailed':
    case 'InvalidDigits':
    case 'InvalidDigest':
    case 'InvalidWindow':
    case 'InvalidPeriod':
    case 'InvalidSecretLength':
      return error.message;

    default:
      return assertNever(error);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
