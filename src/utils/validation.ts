// Narrowing helpers for untyped request input

export const asString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export const asTrimmedString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;

export const asInteger = (value: unknown): number | undefined => {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isSafeInteger(parsed) ? parsed : undefined;
};
