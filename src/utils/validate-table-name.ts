const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Table names are interpolated into SQL, so only plain identifiers pass.
 * @throws Error when `tableName` is not a plain identifier
 */
export function validateTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}
