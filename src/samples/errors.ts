/**
 * Sample acquisition errors
 */

export class SampleNotFoundError extends Error {
  readonly productName: string;
  readonly searched: string[];

  constructor(productName: string, searched: string[]) {
    super(`No sample data found for "${productName}"`);
    this.name = 'SampleNotFoundError';
    this.productName = productName;
    this.searched = searched;
  }
}

export class SampleFormatError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(`${message} (${source})`);
    this.name = 'SampleFormatError';
    this.source = source;
  }
}
