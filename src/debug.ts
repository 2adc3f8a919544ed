export type DebugFlag = 'dispatch' | 'codegen';

function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  const val = raw.toLowerCase();
  return val === '1' || val === 'true' || val === 'yes' || val === 'on';
}

/**
 * Debug flag check.
 * `SCRIPT_CODEGEN_DEBUG=all` enables every flag, `SCRIPT_CODEGEN_DEBUG=dispatch,codegen`
 * selected ones.
 */
export function debugEnabled(flag: DebugFlag): boolean {
  const raw = process.env.SCRIPT_CODEGEN_DEBUG;
  if (!raw) return false;
  if (parseFlag(raw)) return true;

  const parts = raw
    .split(',')
    .map(p => p.trim().toLowerCase())
    .filter(Boolean);

  return parts.includes(flag) || parts.includes('all');
}

/**
 * Writes a debug line to stderr when `flag` is enabled.
 */
export function debugLog(flag: DebugFlag, ...args: unknown[]): void {
  if (debugEnabled(flag)) {
    console.error(`[codegen:${flag}]`, ...args);
  }
}
