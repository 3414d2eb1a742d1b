/**
 * Input Guard
 * ===========
 * Field validators and a sanitizer for user-supplied text.
 *
 * The injection battery is a rejection layer for obviously hostile input. It
 * is a heuristic: it will reject some legitimate text and miss obfuscated
 * payloads. Every store query is parameterized regardless.
 */

export type FieldKind =
  | "identifier"
  | "name"
  | "personName"
  | "description"
  | "category"
  | "searchQuery"
  | "email";

export type ValidationOutcome = {
  valid: boolean;
  sanitizedValue?: string;
};

type InjectionRule = {
  name: string;
  pattern: RegExp;
};

const INJECTION_RULES: ReadonlyArray<InjectionRule> = [
  {
    name: "sql_keyword_sequence",
    pattern:
      /\bunion\s+select\b|\binsert\s+into\b|\bupdate\s+[\w.`"[\]]+\s+set\b|\bdelete\s+from\b|\bdrop\s+table\b|\bcreate\s+table\b|\balter\s+table\b|\bexec\s*\(|\bexecute\s*\(/i,
  },
  {
    name: "script_or_event_handler",
    pattern: /\b(?:script|javascript|vbscript|onload|onerror|onclick|onmouseover)\b/i,
  },
  { name: "boolean_tautology", pattern: /\b(?:or|and)\s+['"0-9].*['"0-9]\s*=\s*['"0-9]/i },
  { name: "quoted_condition_dash_comment", pattern: /'\s+(?:or|and)\s+.*=.*--/i },
  { name: "quoted_condition_hash_comment", pattern: /'\s+(?:or|and)\s+.*=.*#/i },
  { name: "stacked_statement", pattern: /';\s*(?:drop|delete|insert|update|select|union)\b/i },
  { name: "quote_dash_comment", pattern: /'\s*--/ },
  { name: "quote_hash_comment", pattern: /'\s*#/ },
  { name: "keyword_then_comment", pattern: /\b(?:drop|delete|insert|update)\s.*--/i },
];

/**
 * Name of the first injection rule `raw` matches, or null.
 */
export function findInjection(raw: string): string | null {
  for (const rule of INJECTION_RULES) {
    if (rule.pattern.test(raw)) {return rule.name;}
  }
  return null;
}

export function containsInjection(raw: string): boolean {
  return findInjection(raw) !== null;
}

const DANGEROUS_TAIL =
  /\s*(?:\b(?:DROP|DELETE|INSERT|UPDATE|SELECT|UNION|EXEC|EXECUTE|SCRIPT|JAVASCRIPT)\b|--|\/\*|\*\/|<|>)[\s\S]*$/i;

/**
 * Normalizes text: line breaks and tabs become spaces, other control
 * characters, quotes, `;` and backslashes are dropped, and everything from the
 * first dangerous keyword or comment marker on is cut off.
 */
export function sanitize(raw: string): string {
  return raw
    .replace(/[\t\n\r]/g, " ")
    .replace(/[\x00-\x1F\x7F]/g, "")
    .replace(/[';"\\]/g, "")
    .replace(DANGEROUS_TAIL, "")
    .trim();
}

type FieldRule = {
  pattern: RegExp;
  /** Reject instead of rewriting when sanitizing would change the value. */
  strict: boolean;
  lowercase?: boolean;
};

const FIELD_RULES: Readonly<Record<FieldKind, FieldRule>> = {
  identifier: { pattern: /^[A-Za-z0-9_-]{1,50}$/, strict: true },
  name: { pattern: /^[\p{L}\p{N}\s_.,()-]{1,255}$/u, strict: false },
  personName: { pattern: /^[\p{L}\p{M}\s.,-]{1,100}$/u, strict: false },
  description: { pattern: /^[\s\S]{1,2000}$/, strict: false },
  category: { pattern: /^[\p{L}\p{N}\s_-]{1,100}$/u, strict: false },
  searchQuery: { pattern: /^[\p{L}\p{N}\s_.,()-]{1,100}$/u, strict: false },
  email: {
    pattern: /^(?=.{3,255}$)[^\s@]+@[^\s@]+\.[^\s@]+$/,
    strict: true,
    lowercase: true,
  },
};

function check(kind: FieldKind, raw: unknown, forceStrict: boolean): ValidationOutcome {
  if (typeof raw !== "string") {return { valid: false };}
  if (containsInjection(raw)) {return { valid: false };}

  const rule = FIELD_RULES[kind];
  let value = sanitize(raw);
  if ((rule.strict || forceStrict) && value !== raw.trim()) {return { valid: false };}
  if (rule.lowercase) {value = value.toLowerCase();}

  if (!rule.pattern.test(value)) {return { valid: false };}
  return { valid: true, sanitizedValue: value };
}

export function validateField(kind: FieldKind, raw: unknown): ValidationOutcome {
  return check(kind, raw, false);
}

/**
 * Like `validateField`, but fails for any value sanitizing would alter.
 */
export function validateStrict(kind: FieldKind, raw: unknown): ValidationOutcome {
  return check(kind, raw, true);
}

/**
 * Sanitized, trimmed value, or null when the raw input looks like an
 * injection attempt or the cleaned value does not fit the field.
 */
export function validateAndSanitize(raw: unknown, kind: FieldKind = "description"): string | null {
  const outcome = validateField(kind, raw);
  return outcome.valid && outcome.sanitizedValue !== undefined ? outcome.sanitizedValue : null;
}

export function isValid(kind: FieldKind, raw: unknown): boolean {
  return validateField(kind, raw).valid;
}

export const MAX_PRICE = 999_999.99;

/** Whole cents only: the price column keeps two decimal places. */
function hasAtMostTwoDecimals(value: number): boolean {
  const cents = value * 100;
  return Math.abs(cents - Math.round(cents)) < 1e-6;
}

export function isValidPrice(price: unknown): price is number {
  return (
    typeof price === "number" &&
    Number.isFinite(price) &&
    price > 0 &&
    price <= MAX_PRICE &&
    hasAtMostTwoDecimals(price)
  );
}

export function isValidPriceRange(minPrice: unknown, maxPrice: unknown): boolean {
  return isValidPrice(minPrice) && isValidPrice(maxPrice) && minPrice <= maxPrice;
}

export function isValidCurrency(currency: unknown): currency is string {
  return typeof currency === "string" && /^[A-Z]{3}$/i.test(currency.trim());
}
