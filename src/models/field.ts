export type CellValue = string | number | boolean;

/**
 * A single cell of an extracted record. Absence means "unknown", never zero.
 */
export type Field<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

export const ABSENT: Field<never> = Object.freeze({ present: false });

export function present<T>(value: T): Field<T> {
  return { present: true, value };
}

/**
 * Returns the values of the given fields when every one of them is present,
 * otherwise undefined.
 */
export function allPresent(...fields: Field<number>[]): number[] | undefined {
  const values: number[] = [];
  for (const field of fields) {
    if (!field.present) return undefined;
    values.push(field.value);
  }
  return values;
}
