export function isObject(
  value: unknown
): value is Record<PropertyKey, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isError(value: unknown): value is Error {
  const { isError: isErrorFn } = Error as {
    isError?: (err: unknown) => boolean;
  };
  if (typeof isErrorFn === 'function') {
    return isErrorFn(value);
  }
  return value instanceof Error;
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}
