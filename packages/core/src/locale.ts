/**
 * Locale code validation.
 *
 * Accepted forms: ISO-639-1 lower case (`en`) or language plus territory
 * (`en_US`). This is the only place the syntax is enforced; everything
 * downstream trusts the locales it is given.
 */

export type LocaleCode = string;

const RE_LOCALE = /(^[a-z]{2}_[A-Z]{2}$)|(^[a-z]{2}$)/;

export class InvalidLocaleError extends Error {
  readonly code = "invalid-locale";

  constructor(public readonly value: string) {
    super(
      "Language code values must be either ISO-639-1 lower case " +
        "or represented with their territory/region/country codes, " +
        `received '${value}' expected forms examples: 'en' or 'en_US'.`,
    );
    this.name = "InvalidLocaleError";
  }
}

export function isLocaleCode(value: string): boolean {
  return RE_LOCALE.test(value);
}

function assertLocale(value: string): void {
  if (!isLocaleCode(value)) {
    throw new InvalidLocaleError(value);
  }
}

/**
 * Validate a locale code, or every key of a locale-keyed mapping.
 *
 * Values of a mapping are not inspected. Other shapes are returned as-is
 * for the caller's own type checks.
 *
 * @throws InvalidLocaleError on the first malformed code
 */
export function validateLocale<T>(value: T): T {
  if (typeof value === "string") {
    assertLocale(value);
  } else if (value instanceof Map) {
    for (const key of value.keys()) {
      if (typeof key !== "string") throw new InvalidLocaleError(String(key));
      assertLocale(key);
    }
  } else if (isPlainObject(value)) {
    for (const key of Object.keys(value)) {
      assertLocale(key);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
