/** Read a numeric HTTP status off SDK errors that expose one as `status`. */
export function extractStatusCode(error: Error): number | undefined {
  if (!('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Collapse HTML error pages into a short plain-text message. */
export function sanitizeErrorMessage(message: string): string {
  if (message.includes('<!DOCTYPE') || message.includes('<html')) {
    return message
      .replace(/<[^>]*>/g, '')
      .replace(/\s+/g, ' ')
      .trim()
      .slice(0, 200);
  }
  return message;
}
