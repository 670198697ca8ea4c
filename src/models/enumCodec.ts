/**
 * Reads a stored enum value back into its closed union. Unknown values mean the
 * row was written by something other than this engine and are never defaulted.
 */
export const parseEnumValue = <T extends string>(values: readonly T[], raw: string, label: string): T => {
  const match = values.find((value) => value === raw);
  if (match === undefined) {
    throw new Error(`Unknown ${label} value in storage: "${raw}"`);
  }
  return match;
};

export const parseOptionalEnumValue = <T extends string>(
  values: readonly T[],
  raw: string | null,
  label: string
): T | null => (raw === null ? null : parseEnumValue(values, raw, label));
