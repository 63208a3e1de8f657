/**
 * Input normalization for dirty plain-config inputs
 * Applied in lenient mode before schema validation
 */

export interface NormalizationOptions {
  trimWhitespace: boolean;
  lowercaseDomainName: boolean;
}

export const DEFAULT_NORMALIZATION: NormalizationOptions = {
  trimWhitespace: true,
  lowercaseDomainName: true,
};

/** Payloads whose whitespace is meaningful to the guest */
const VERBATIM_KEYS: ReadonlySet<string> = new Set(['userData', 'notes', 'privateKey']);

export type RepairListener = (field: string, original: unknown, repaired: unknown) => void;

/**
 * Returns a normalized copy of the top-level entries of `rawInput`.
 * Non-string values and verbatim payloads pass through unchanged.
 */
export function normalizeOptionsInput(
  rawInput: Record<string, unknown>,
  options: NormalizationOptions = DEFAULT_NORMALIZATION,
  onRepair?: RepairListener
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(rawInput)) {
    if (typeof value !== 'string' || VERBATIM_KEYS.has(key)) {
      normalized[key] = value;
      continue;
    }

    let cleanValue = value;

    if (options.trimWhitespace) {
      cleanValue = cleanValue.trim();
    }

    if (key === 'domainName' && options.lowercaseDomainName) {
      cleanValue = cleanValue.toLowerCase();
    }

    if (cleanValue !== value) {
      onRepair?.(key, value, cleanValue);
    }
    normalized[key] = cleanValue;
  }

  return normalized;
}
