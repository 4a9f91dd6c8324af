/**
 * Sample Parser - reads (price, rating) observations from CSV or JSON text
 *
 * CSV handling:
 * - Auto-detection of delimiter (comma, semicolon, tab, pipe)
 * - UTF-8 BOM stripping, Windows and Unix line endings
 * - Quoted fields with embedded delimiters and escaped quotes ("")
 * - Flexible header names ("Unit Price" -> price, "Reviews" -> rating)
 * - Localized numbers: "1.299,90 TL", "$1,299.90", "(1,234)"
 *
 * A row whose price cannot be read is skipped. An unreadable or absent
 * rating is kept as 0, which downstream code treats as missing.
 */

import { createLogger } from '../utils/logger';
import type { RawSamples } from './types';

const logger = createLogger('sample-parser');

type SampleField = 'price' | 'rating';

const COLUMN_ALIASES: Record<string, SampleField> = {
  'price': 'price',
  'unit price': 'price',
  'unit_price': 'price',
  'sale price': 'price',
  'sale_price': 'price',
  'list price': 'price',
  'list_price': 'price',
  'amount': 'price',

  'rating': 'rating',
  'ratings': 'rating',
  'score': 'rating',
  'stars': 'rating',
  'reviews': 'rating',
  'review count': 'rating',
  'review_count': 'rating',
  'rating count': 'rating',
  'rating_count': 'rating',
};

// ---------------------------------------------------------------------------
// Number parsing
// ---------------------------------------------------------------------------

const THOUSANDS_GROUP = /^-?[1-9]\d{0,2}[.,]\d{3}$/;

/**
 * Parse a human-formatted number. When both '.' and ',' occur, the last one
 * is the decimal mark. When only one of them occurs, it is a thousands
 * separator if it repeats ("1.234.567") or splits a 1-3 digit group not
 * starting with 0 from exactly three digits ("1.299 TL", "1,234").
 * Otherwise it is the decimal mark ("4,5", "0.125").
 */
export function parseLocalizedNumber(raw: string): number {
  let text = raw.replace(/[^0-9.,-]/g, '');
  if (!text || !/[0-9]/.test(text)) return NaN;

  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');

  if (lastDot >= 0 && lastComma >= 0) {
    if (lastComma > lastDot) {
      text = text.replace(/\./g, '').replace(',', '.');
    } else {
      text = text.replace(/,/g, '');
    }
  } else if (lastDot >= 0 || lastComma >= 0) {
    const mark = lastComma >= 0 ? ',' : '.';
    const groups = text.split(mark);
    if (groups.length > 2 || THOUSANDS_GROUP.test(text)) {
      text = groups.join('');
    } else if (mark === ',') {
      text = text.replace(',', '.');
    }
  }

  return Number(text);
}

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

/**
 * Pick the delimiter that splits the sampled lines most often and most
 * consistently. Prefers comma > semicolon > tab > pipe on equal scores.
 */
function detectDelimiter(lines: string[]): string {
  const sampleLines = lines.slice(0, 10);
  if (sampleLines.length === 0) return ',';

  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of [',', ';', '\t', '|']) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const consistencyBonus = new Set(counts).size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

function parseFields(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim().length === 0) {
      inQuotes = true;
      current = '';
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current.trim());
  return fields;
}

function mapColumns(headers: string[]): Partial<Record<SampleField, number>> {
  const mapping: Partial<Record<SampleField, number>> = {};
  headers.forEach((raw, index) => {
    const normalized = raw.toLowerCase().replace(/[^a-z0-9\s_]/g, '').trim();
    const field = COLUMN_ALIASES[normalized];
    if (field && mapping[field] === undefined) {
      mapping[field] = index;
    }
  });
  return mapping;
}

// ---------------------------------------------------------------------------
// parseSampleCsv
// ---------------------------------------------------------------------------

/**
 * Parse CSV text with a header row. Throws when no price column is found.
 */
export function parseSampleCsv(csvData: string): RawSamples {
  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }

  const lines = data
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n')
    .filter((line) => line.trim().length > 0);

  const prices: number[] = [];
  const ratings: number[] = [];
  if (lines.length === 0) {
    return { prices, ratings, skippedRows: 0 };
  }

  const delimiter = detectDelimiter(lines);
  const columns = mapColumns(parseFields(lines[0], delimiter));
  const priceIndex = columns.price;
  if (priceIndex === undefined) {
    throw new Error('No price column found in header');
  }
  const ratingIndex = columns.rating;

  let skippedRows = 0;
  for (const line of lines.slice(1)) {
    const fields = parseFields(line, delimiter);
    const price = parseLocalizedNumber(fields[priceIndex] ?? '');
    if (!Number.isFinite(price) || price <= 0) {
      skippedRows++;
      continue;
    }
    const rating = ratingIndex === undefined ? NaN : parseLocalizedNumber(fields[ratingIndex] ?? '');
    prices.push(price);
    ratings.push(Number.isFinite(rating) && rating > 0 ? rating : 0);
  }

  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, rows: prices.length, skippedRows },
    'Parsed sample CSV',
  );

  return { prices, ratings, skippedRows };
}

// ---------------------------------------------------------------------------
// parseSampleJson
// ---------------------------------------------------------------------------

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseLocalizedNumber(value);
  return NaN;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts `{ "prices": [...], "ratings": [...] }` or `[{ "price": ..., "rating": ... }]`.
 */
export function parseSampleJson(jsonData: string): RawSamples {
  const parsed: unknown = JSON.parse(jsonData);

  let rows: Array<{ price: unknown; rating: unknown }>;
  if (Array.isArray(parsed)) {
    rows = parsed.filter(isRecord).map((r) => ({ price: r.price, rating: r.rating }));
  } else if (isRecord(parsed) && Array.isArray(parsed.prices)) {
    const rawPrices: unknown[] = parsed.prices;
    const rawRatings: unknown[] = Array.isArray(parsed.ratings) ? parsed.ratings : [];
    if (rawRatings.length > 0 && rawRatings.length !== rawPrices.length) {
      throw new Error(`prices and ratings differ in length (${rawPrices.length} vs ${rawRatings.length})`);
    }
    rows = rawPrices.map((price, i) => ({ price, rating: rawRatings[i] }));
  } else {
    throw new Error('Expected an array of samples or an object with a prices array');
  }

  const prices: number[] = [];
  const ratings: number[] = [];
  let skippedRows = 0;
  for (const row of rows) {
    const price = toNumber(row.price);
    if (!Number.isFinite(price) || price <= 0) {
      skippedRows++;
      continue;
    }
    const rating = toNumber(row.rating);
    prices.push(price);
    ratings.push(Number.isFinite(rating) && rating > 0 ? rating : 0);
  }

  return { prices, ratings, skippedRows };
}
