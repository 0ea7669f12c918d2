// Data validation utilities
import type { EmailValidator, EndpointType } from '../models';

/**
 * Validates email format using RFC 5322 compliant regex
 */
export function isValidEmailFormat(email: string): boolean {
  if (!email || typeof email !== 'string') {
    return false;
  }

  // RFC 5322 compliant email regex (simplified)
  const emailRegex = /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

  return emailRegex.test(email.trim());
}

/**
 * Default email capability backed by the format check
 */
export const formatEmailValidator: EmailValidator = {
  validate: isValidEmailFormat
};

/**
 * Classifies the raw endpoint type column. Matching is exact, as written in the registry.
 */
export function classifyEndpointType(rawType: string): EndpointType {
  if (rawType === 'DIRECT' || rawType === 'EMAIL') {
    return rawType;
  }

  return 'OTHER';
}

/**
 * Splits an address into local part and domain, or null when it has no usable @
 */
export function splitAddress(address: string): { localPart: string; domain: string } | null {
  const trimmed = address.trim();
  const at = trimmed.lastIndexOf('@');

  if (at <= 0 || at === trimmed.length - 1) {
    return null;
  }

  return {
    localPart: trimmed.slice(0, at),
    domain: trimmed.slice(at + 1).toLowerCase()
  };
}
