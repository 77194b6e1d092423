/**
 * Logging redaction utilities to prevent PII exposure
 */

export function maskAccountNumber(value?: string | null): string {
  if (!value) return 'unknown';
  // keep last 4 for correlation
  return value.length <= 4 ? '****' : `${'*'.repeat(value.length - 4)}${value.slice(-4)}`;
}

export function maskEmail(value?: string | null): string {
  if (!value) return 'unknown';
  const at = value.indexOf('@');
  if (at <= 0) return '***';
  return `${value[0]}***${value.slice(at)}`;
}

export function maskPhone(value?: string | null): string {
  if (!value) return 'unknown';
  const digits = value.replace(/\D/g, '');
  return digits.length <= 2 ? '***' : `***${digits.slice(-2)}`;
}
