const ROLE_SUFFIXES = ['Machine', 'Entity'];

/**
 * Converts a PascalCase class name to a snake_case pluralized table name,
 * dropping a trailing role suffix.
 * E.g., "BankTransactionMachine" -> "bank_transactions", "Entry" -> "entries"
 */
export function deriveTableName(className: string): string {
  let base = className;
  for (const suffix of ROLE_SUFFIXES) {
    if (base.length > suffix.length && base.endsWith(suffix)) {
      base = base.slice(0, -suffix.length);
      break;
    }
  }

  const snakeCase = base
    .replace(/([A-Z])/g, '_$1')
    .toLowerCase()
    .replace(/^_/, '');

  return pluralize(snakeCase);
}

function pluralize(word: string): string {
  if (word.endsWith('y')) {
    const beforeY = word[word.length - 2];
    if (beforeY && 'aeiou'.includes(beforeY)) {
      return word + 's';
    }
    return word.slice(0, -1) + 'ies';
  }
  if (/(s|x|z|ch|sh)$/.test(word)) {
    return word + 'es';
  }
  return word + 's';
}
