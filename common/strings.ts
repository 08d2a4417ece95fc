//NOTE: Shared string utilities
//NOTE: redactSecrets keeps tokens out of surfaced git output and error messages

export const REDACTED = '[REDACTED]';

export function isEmpty(text: unknown): boolean {
  if (typeof text !== 'string') {
    return true;
  }
  return text.trim().length === 0;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function redactSecrets(text: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret) continue;
    result = result.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
    //NOTE: git percent-encodes credentials embedded in a URL
    const encoded = encodeURIComponent(secret);
    if (encoded !== secret) {
      result = result.replace(new RegExp(escapeRegExp(encoded), 'g'), REDACTED);
    }
  }
  return result;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
