/**
 * Input validation for index names and fields before they are placed into a
 * request path or body.
 *
 * @module
 */

/** Only allow alphanumeric, hyphens, dots, asterisks, commas, and underscores. */
const INDEX_NAME_REGEX = /^[a-zA-Z0-9\-.*,_]+$/;

/** Field paths: anything printable except whitespace, commas and quotes. */
const FIELD_NAME_REGEX = /^[^\s,"']+$/;

/**
 * Validates that an index name contains only safe characters.
 *
 * The index pattern becomes part of the request path, so path separators and
 * query characters are rejected.
 *
 * @param index - The index name or pattern to validate.
 * @throws {Error} If the index name contains invalid characters.
 */
export function validateIndexName(index: string): void {
  if (!index || !INDEX_NAME_REGEX.test(index) || /(^|,)\.\.?(,|$)/.test(index)) {
    throw new Error(
      `Invalid index name "${index}". Only alphanumeric characters, hyphens, dots, asterisks, commas, and underscores are allowed.`,
    );
  }
}

/** @throws {Error} If the field name is empty or contains whitespace, commas or quotes. */
export function validateFieldName(field: string): void {
  if (!FIELD_NAME_REGEX.test(field)) {
    throw new Error(`Invalid field name "${field}".`);
  }
}
