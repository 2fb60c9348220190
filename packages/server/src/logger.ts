let verbose = false;

function ts(): string {
  return new Date().toISOString();
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function logDebug(message: string, meta?: unknown): void {
  if (!verbose) return;
  if (meta !== undefined) {
    console.log(`[${ts()}] DEBUG ${message}`, meta);
    return;
  }
  console.log(`[${ts()}] DEBUG ${message}`);
}

export function logInfo(message: string, meta?: unknown): void {
  if (meta !== undefined) {
    console.log(`[${ts()}] INFO ${message}`, meta);
    return;
  }
  console.log(`[${ts()}] INFO ${message}`);
}

export function logWarn(message: string, meta?: unknown): void {
  if (meta !== undefined) {
    console.warn(`[${ts()}] WARN ${message}`, meta);
    return;
  }
  console.warn(`[${ts()}] WARN ${message}`);
}

export function logError(message: string, meta?: unknown): void {
  if (meta !== undefined) {
    console.error(`[${ts()}] ERROR ${message}`, meta);
    return;
  }
  console.error(`[${ts()}] ERROR ${message}`);
}
