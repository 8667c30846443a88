/**
 * Candidate extraction from input files
 *
 * A `.csv` file contributes the first cell of each row. Any other file is
 * treated as a saved MIME message: its decoded text body is scanned for
 * address-like tokens, headers and attachments are not.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { simpleParser } from 'mailparser';
import { InputError, errorMessage } from './errors';

/**
 * Permissive address pattern used to pick addresses out of free text
 */
const MESSAGE_EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Rows whose first cell starts with this are comments
 */
const COMMENT_PREFIX = '#';

/**
 * Extracts candidate addresses from CSV text
 *
 * Takes the first cell of every row, trimmed. Empty rows and rows whose
 * first cell starts with '#' are skipped. Rows may have any number of cells.
 *
 * @param text - CSV content
 * @returns Addresses in file order, duplicates kept
 *
 * @example
 * ```ts
 * extractFromCsv('# exported list\nuser@example.com,User\n'); // ['user@example.com']
 * ```
 */
export function extractFromCsv(text: string): string[] {
  const rows: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true,
  });

  if (!Array.isArray(rows)) {
    return [];
  }

  const emails: string[] = [];
  for (const row of rows) {
    const first: unknown = Array.isArray(row) ? row[0] : undefined;
    if (typeof first !== 'string') continue;

    const cell = first.trim();
    if (cell && !cell.startsWith(COMMENT_PREFIX)) {
      emails.push(cell);
    }
  }
  return emails;
}

/**
 * Extracts every address-like token from free text
 *
 * @returns Matches in order of appearance
 *
 * @example
 * ```ts
 * extractFromText('Contact alice@example.com or bob@example.org.');
 * // ['alice@example.com', 'bob@example.org']
 * ```
 */
export function extractFromText(text: string): string[] {
  return text.match(MESSAGE_EMAIL_PATTERN) ?? [];
}

/**
 * Extracts addresses from the plain-text body of a message
 *
 * Transfer encodings (base64, quoted-printable) and charsets are decoded
 * first. Header fields such as From or Message-ID are not scanned.
 *
 * @param source - Raw RFC 5322 message
 */
export async function extractFromMessage(source: string | Buffer): Promise<string[]> {
  const message = await simpleParser(source);
  return extractFromText(message.text ?? '');
}

/**
 * Reads an input file and extracts its candidate addresses
 *
 * @param path - A `.csv` file (case-insensitive extension) or a message file
 * @throws InputError if the file cannot be read or parsed
 */
export async function readCandidates(path: string): Promise<string[]> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (error) {
    throw new InputError(path, `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return extname(path).toLowerCase() === '.csv'
      ? extractFromCsv(content.toString('utf8'))
      : await extractFromMessage(content);
  } catch (error) {
    throw new InputError(path, `Cannot parse ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
