import { Logger } from '@nestjs/common';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/**
 * Safely parse a boolean flag from a string, with a default fallback
 * @param name - Name of the variable, used in the warning
 * @param value - The string value to parse
 * @param defaultValue - The default value if the string is missing or unrecognised
 * @returns Parsed boolean or default value
 */
export function safeParseBoolean(
  name: string,
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  const normalized = value?.trim().toLowerCase();

  if (!normalized) {
    return defaultValue;
  }

  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }

  Logger.warn(
    `Invalid boolean in ${name}="${value}"; using ${String(defaultValue)}.`,
  );

  return defaultValue;
}

/**
 * Read an environment variable, treating blank values as unset
 */
export function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();

  return value ? value : undefined;
}
