import type { LeafValue } from '../types';

/**
 * Host-language string literal, following the host's own `repr` rules:
 *
 * 1. Quote:
 *    Single quotes, unless the text contains a single quote and no double
 *    quote.
 * 2. Escapes:
 *    Backslash, the chosen quote, `\n`, `\r`, `\t`; other control characters
 *    as `\xNN`. Everything else is kept verbatim.
 *
 * Example:
 *   renderString("it's")   -> "\"it's\""
 *   renderString('a\nb')   -> "'a\\nb'"
 */
export function renderString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let body = '';

  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;

    if (char === '\\' || char === quote) body += `\\${char}`;
    else if (char === '\n') body += '\\n';
    else if (char === '\r') body += '\\r';
    else if (char === '\t') body += '\\t';
    else if (code < 0x20 || code === 0x7f)
      body += `\\x${code.toString(16).padStart(2, '0')}`;
    else body += char;
  }

  return `${quote}${body}${quote}`;
}

function renderNumber(value: number): string {
  if (Number.isNaN(value)) return "float('nan')";
  if (value === Infinity) return "float('inf')";
  if (value === -Infinity) return "-float('inf')";
  if (Object.is(value, -0)) return '-0.0';
  return String(value);
}

/**
 * Host-language literal for a leaf value.
 */
export function renderLiteral(value: LeafValue): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return renderNumber(value);
  return renderString(value);
}

/**
 * Turns an arbitrary helper name into an identifier suffix
 * (`"convert:nbt_compound"` -> `"convert_nbt_compound"`).
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_]/g, '_');
}
