import { getConfig } from "./config";

// Set RECIPEGRAD_DEBUG=1 (or setConfig({ debug: true })) to enable.
export function isDebugEnabled(): boolean {
  return getConfig().debug;
}

export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.log(`[${scope}] ${message}`);
}
