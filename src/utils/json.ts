/**
 * JSON replacer that writes bigint values (fees, payments) as decimal strings.
 */
export const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value

export const toJson = (value: unknown): string => JSON.stringify(value, bigintReplacer)
