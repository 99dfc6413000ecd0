/**
 * Canonical field naming for survey export columns
 */

const SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  [" ", "_"],
  ["/", "_"],
  ["?", ""],
  ["-", "_"],
  ["&", "and"],
];

/**
 * Rewrite a raw column name into its canonical, storage-safe form.
 *
 * The result contains none of the substituted characters and no surrounding
 * whitespace, so applying the function to its own output changes nothing.
 *
 * @example
 * canonicalFieldName(" How many hours do you sleep? ") // "How_many_hours_do_you_sleep"
 * canonicalFieldName("Food & Water/Source")            // "Food_and_Water_Source"
 */
export function canonicalFieldName(raw: string): string {
  let name = raw.trim();
  for (const [from, to] of SUBSTITUTIONS) {
    name = name.replaceAll(from, to);
  }
  return name.trim();
}
