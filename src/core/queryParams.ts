export type QueryValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | readonly QueryValue[]
  | { readonly [key: string]: QueryValue };

export type QueryParams = { readonly [key: string]: QueryValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

/**
 * Appends `value` to `query` under `key`.
 *
 * Lists repeat the key once per element; nested objects extend the key with
 * `.inner`. Values with no query representation (fractional numbers, null,
 * undefined, dates, class instances) are skipped.
 */
export function addQuery(query: URLSearchParams, key: string, value: unknown): void {
  if (typeof value === "string") {
    query.append(key, value);
    return;
  }
  if (typeof value === "number") {
    // BigInt gives the exact decimal, never exponent notation
    if (Number.isInteger(value)) query.append(key, BigInt(value).toString());
    return;
  }
  if (typeof value === "bigint") {
    query.append(key, value.toString());
    return;
  }
  if (typeof value === "boolean") {
    query.append(key, value ? "true" : "false");
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) addQuery(query, key, item);
    return;
  }
  if (isPlainObject(value)) {
    for (const [inner, v] of Object.entries(value)) addQuery(query, `${key}.${inner}`, v);
  }
}

export function flattenQuery(params: QueryParams): URLSearchParams {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) addQuery(query, key, value);
  return query;
}
