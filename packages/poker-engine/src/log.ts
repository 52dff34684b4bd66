function stamp(): string {
  return new Date().toISOString();
}

export function log(msg: string): void {
  console.log(`[${stamp()}] [poker-engine] ${msg}`);
}

export function logWarn(msg: string): void {
  console.warn(`[${stamp()}] [poker-engine] WARN: ${msg}`);
}

export function logError(msg: string, err?: unknown): void {
  const errStr = err instanceof Error ? err.message : String(err ?? "");
  console.error(`[${stamp()}] [poker-engine] ERROR: ${msg}${errStr ? ` - ${errStr}` : ""}`);
}
