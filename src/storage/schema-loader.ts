/**
 * Schema SQL loading and statement splitting.
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Path of the bundled schema file. */
export const SCHEMA_PATH = join(__dirname, 'schema.sql');

/**
 * Load and parse a schema SQL file into individual statements.
 */
export function loadSchemaStatements(schemaPath: string = SCHEMA_PATH): string[] {
  return splitStatements(readFileSync(schemaPath, 'utf-8'));
}

/**
 * Split SQL text into individual statements.
 *
 * A semicolon at the end of a line ends a statement. Comment lines
 * before a statement are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();

    if (!current && (trimmed.startsWith('--') || trimmed.length === 0)) continue;

    current += (current ? '\n' : '') + line;

    if (trimmed.endsWith(';')) {
      const stmt = current.trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = '';
    }
  }

  // Trailing statement without a semicolon
  const rest = current.trim().replace(/;$/, '').trim();
  if (rest) statements.push(rest);

  return statements;
}
