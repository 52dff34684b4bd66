export function log(msg: string): void {
  const ts = new Date().toISOString();
  console.log(`[${ts}] [sim] ${msg}`);
}

export function logWarn(msg: string): void {
  const ts = new Date().toISOString();
  console.warn(`[${ts}] [sim] WARN: ${msg}`);
}

export function logError(msg: string, err?: unknown): void {
  const ts = new Date().toISOString();
  const errStr = err instanceof Error ? err.message : String(err ?? "");
  console.error(`[${ts}] [sim] ERROR: ${msg}${errStr ? ` - ${errStr}` : ""}`);
}
