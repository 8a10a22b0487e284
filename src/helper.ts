const CAMEL_CASE_PATTERN = /(?<!^)(?=[A-Z])/g;

/** `RegexpReplace` -> `REGEXP_REPLACE` */
export function camelToSnakeCase(name: string): string {
  return name.replace(CAMEL_CASE_PATTERN, "_").toUpperCase();
}

export function seqGet<T>(seq: readonly T[], index: number): T | undefined {
  const i = index < 0 ? seq.length + index : index;
  return i >= 0 && i < seq.length ? seq[i] : undefined;
}

/** Joins the non-empty parts with `sep`. */
export function csv(parts: readonly string[], sep: string = ", "): string {
  return parts.filter(Boolean).join(sep);
}

export function isInt(text: string): boolean {
  return /^-?\d+$/.test(text.trim());
}

export function toBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return defaultValue;
  }
  const lower = value.trim().toLowerCase();
  return lower === "true" || lower === "1";
}
