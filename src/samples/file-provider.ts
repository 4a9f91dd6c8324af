/**
 * File-backed sample provider
 *
 * Looks up `<slug>.csv`, then `<slug>.json`, inside a samples directory.
 * The slug is the product name lower-cased with runs of other characters
 * collapsed to '-': "Wireless Mouse" -> wireless-mouse.csv
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname, join } from 'path';
import { createLogger } from '../utils/logger';
import { SampleFormatError, SampleNotFoundError } from './errors';
import { imputeMissingRatings } from './impute';
import { parseSampleCsv, parseSampleJson } from './parser';
import type { RawSamples, SampleProvider, SampleSet } from './types';

const logger = createLogger('sample-provider');

const EXTENSIONS = ['.csv', '.json'] as const;

export function productSlug(productName: string): string {
  return productName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function parseByExtension(content: string, filePath: string): RawSamples {
  try {
    return extname(filePath).toLowerCase() === '.json'
      ? parseSampleJson(content)
      : parseSampleCsv(content);
  } catch (err) {
    throw new SampleFormatError(err instanceof Error ? err.message : String(err), filePath);
  }
}

/**
 * Read and parse a sample file, imputing missing ratings with the mean of
 * the known ones.
 */
export async function loadSampleFile(filePath: string): Promise<SampleSet> {
  const content = await readFile(filePath, 'utf-8');
  const raw = parseByExtension(content, filePath);

  if (raw.prices.length === 0) {
    throw new SampleFormatError('No usable price rows', filePath);
  }

  const imputed = imputeMissingRatings(raw.ratings);
  logger.info(
    {
      file: filePath,
      samples: raw.prices.length,
      skippedRows: raw.skippedRows,
      missingRatings: imputed.missing,
      meanRating: imputed.meanRating,
    },
    'Loaded samples',
  );

  return {
    prices: raw.prices,
    ratings: imputed.ratings,
    stats: {
      sampleCount: raw.prices.length,
      missingRatings: imputed.missing,
      meanRating: imputed.meanRating,
      source: filePath,
    },
  };
}

export function createFileSampleProvider(samplesDir: string): SampleProvider {
  return {
    name: 'file',

    async fetchSamples(productName: string): Promise<SampleSet> {
      const slug = productSlug(productName);
      const candidates = slug ? EXTENSIONS.map((ext) => join(samplesDir, `${slug}${ext}`)) : [];

      const found = candidates.find((path) => existsSync(path));
      if (!found) {
        throw new SampleNotFoundError(productName, candidates);
      }

      logger.info({ productName, file: found }, 'Searching samples');
      return loadSampleFile(found);
    },
  };
}
