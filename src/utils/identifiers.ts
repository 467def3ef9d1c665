const SIMPLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertSafeIdentifier(name: string): void {
  if (!SIMPLE_IDENTIFIER.test(name)) {
    throw new Error(`Invalid identifier: ${name}`);
  }
}

export function isSimpleIdentifier(name: string): boolean {
  return SIMPLE_IDENTIFIER.test(name);
}

/**
 * Always-quoted identifier, for names reported by the catalog
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Identifier as it would be written by hand: bare when simple (and so case-folded
 * by PostgreSQL), quoted otherwise
 */
export function columnReference(name: string): string {
  return isSimpleIdentifier(name) ? name : quoteIdentifier(name);
}

export function qualifiedName(schemaName: string | undefined, tableName: string): string {
  return schemaName ? `${columnReference(schemaName)}.${columnReference(tableName)}` : columnReference(tableName);
}
