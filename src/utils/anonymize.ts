import crypto from 'crypto';

// Placeholder only: hashes a preview of the text, no PII detection
export function anonymizeInput(text: string): string {
  const preview = text.slice(0, 100);
  const digest = crypto.createHash('sha256').update(preview).digest('hex').slice(0, 16);
  return `[anonymized:${digest}]`;
}
