// ============================================================================
// Clinical Identifier Utilities — NPI, MRN, ICD-10
// ============================================================================

export interface IdentifierValidation {
  valid: boolean;
  error?: string;
}

/** Card-issuer prefix prepended to a 10-digit NPI before the Luhn check. */
export const NPI_LUHN_PREFIX = '80840';

/**
 * Luhn (modulus 10) check over a digit string: double every second digit
 * counting from the right, subtract 9 from doubled values above 9, and
 * require the total to be divisible by 10.
 */
export function luhnValid(digits: string): boolean {
  let sum = 0;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if ((digits.length - 1 - i) % 2 === 1) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

/**
 * Validates a National Provider Identifier.
 *
 * An NPI is exactly 10 digits whose Luhn checksum holds when the digits are
 * prefixed with `80840`.
 */
export function validateNpi(npi: string): IdentifierValidation {
  if (typeof npi !== 'string' || !/^\d{10}$/.test(npi)) {
    return { valid: false, error: 'NPI must be exactly 10 digits' };
  }

  if (!luhnValid(NPI_LUHN_PREFIX + npi)) {
    return { valid: false, error: 'NPI failed check digit validation' };
  }

  return { valid: true };
}

/** Validates a Medical Record Number: exactly 6 digits. */
export function validateMrn(mrn: string): IdentifierValidation {
  if (typeof mrn !== 'string' || !/^\d{6}$/.test(mrn)) {
    return { valid: false, error: 'MRN must be exactly 6 digits' };
  }
  return { valid: true };
}

// One letter (U is reserved), two digits, optional '.' + 1-4 alphanumerics.
const ICD10_PATTERN = /^[A-TV-Z]\d{2}(\.[A-Z0-9]{1,4})?$/;

/**
 * Validates the shape of an ICD-10 diagnosis code. Format only; the code is
 * not looked up against a code set.
 */
export function validateIcd10(code: string): IdentifierValidation {
  if (typeof code !== 'string' || !ICD10_PATTERN.test(code)) {
    return {
      valid: false,
      error: `Invalid ICD-10 code format: expected a code like 'I10' or 'K21.0'`,
    };
  }
  return { valid: true };
}

/**
 * Masks an identifier for log and audit output, keeping the first 3
 * characters. Example: "123456" → "123***"
 */
export function maskIdentifier(value: string): string {
  if (typeof value !== 'string' || value.length < 3) {
    return '***';
  }
  return value.slice(0, 3) + '*'.repeat(value.length - 3);
}
