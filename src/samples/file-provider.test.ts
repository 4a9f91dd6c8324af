import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createFileSampleProvider, loadSampleFile, productSlug } from './file-provider';
import { SampleFormatError, SampleNotFoundError } from './errors';

describe('productSlug', () => {
  it('lower-cases and collapses separators', () => {
    expect(productSlug('Wireless Mouse')).toBe('wireless-mouse');
    expect(productSlug('  USB-C / Hub (4 port) ')).toBe('usb-c-hub-4-port');
  });

  it('returns an empty slug for names without letters or digits', () => {
    expect(productSlug('***')).toBe('');
  });
});

describe('createFileSampleProvider', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'optiprice-samples-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a CSV file and imputes missing ratings', async () => {
    writeFileSync(join(dir, 'wireless-mouse.csv'), 'price,rating\n10,4\n20,0\n30,2\n');
    const provider = createFileSampleProvider(dir);

    const samples = await provider.fetchSamples('Wireless Mouse');

    expect(samples.prices).toEqual([10, 20, 30]);
    expect(samples.ratings).toEqual([4, 3, 2]);
    expect(samples.stats).toEqual({
      sampleCount: 3,
      missingRatings: 1,
      meanRating: 3,
      source: join(dir, 'wireless-mouse.csv'),
    });
  });

  it('falls back to a JSON file', async () => {
    writeFileSync(join(dir, 'desk-lamp.json'), JSON.stringify({ prices: [15, 25], ratings: [5, 3] }));
    const provider = createFileSampleProvider(dir);

    const samples = await provider.fetchSamples('desk lamp');

    expect(samples.prices).toEqual([15, 25]);
    expect(samples.stats.source).toBe(join(dir, 'desk-lamp.json'));
  });

  it('prefers the CSV file when both exist', async () => {
    writeFileSync(join(dir, 'kettle.csv'), 'price,rating\n40,4\n');
    writeFileSync(join(dir, 'kettle.json'), '{"prices":[99],"ratings":[1]}');
    const provider = createFileSampleProvider(dir);

    const samples = await provider.fetchSamples('Kettle');

    expect(samples.prices).toEqual([40]);
  });

  it('throws SampleNotFoundError listing the paths it tried', async () => {
    const provider = createFileSampleProvider(dir);

    await expect(provider.fetchSamples('Nothing Here')).rejects.toBeInstanceOf(SampleNotFoundError);
    await expect(provider.fetchSamples('Nothing Here')).rejects.toMatchObject({
      searched: [join(dir, 'nothing-here.csv'), join(dir, 'nothing-here.json')],
    });
  });

  it('throws SampleFormatError for a file without usable rows', async () => {
    writeFileSync(join(dir, 'empty.csv'), 'price,rating\nabc,4\n');
    const provider = createFileSampleProvider(dir);

    await expect(provider.fetchSamples('empty')).rejects.toBeInstanceOf(SampleFormatError);
  });
});

describe('loadSampleFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'optiprice-file-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('wraps parser errors in SampleFormatError', async () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{"items":[]}');

    await expect(loadSampleFile(file)).rejects.toThrow(
      `Expected an array of samples or an object with a prices array (${file})`,
    );
  });
});
