/**
 * Schema SQL loading and statement splitting.
 *
 * Reads schema.sql beside this module and splits it into individual
 * statements, keeping BEGIN...END blocks (triggers) intact.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Load and parse the schema SQL file into individual statements.
 */
export function loadSchemaStatements(): string[] {
  const schemaPath = join(__dirname, 'schema.sql');
  const schema = readFileSync(schemaPath, 'utf-8');
  return splitStatements(schema);
}

/**
 * Split SQL text into individual statements, respecting BEGIN...END blocks.
 * Comment lines between statements are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inTrigger = false;

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();

    if (!current && (trimmed === '' || trimmed.startsWith('--'))) continue;

    current += (current ? '\n' : '') + line;

    if (/\bBEGIN\s*$/i.test(trimmed)) {
      inTrigger = true;
    }

    if (inTrigger && /^END\s*;/i.test(trimmed)) {
      inTrigger = false;
      statements.push(current.trim());
      current = '';
      continue;
    }

    if (!inTrigger && trimmed.endsWith(';')) {
      const stmt = current.trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = '';
    }
  }

  if (current.trim()) {
    const stmt = current.trim().replace(/;$/, '').trim();
    if (stmt) statements.push(stmt);
  }

  return statements;
}
