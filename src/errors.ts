export type CatalogErrorCode =
  | 'CARD_NOT_FOUND'
  | 'DATASET_NOT_FOUND'
  | 'DATASET_PARSE_ERROR'
  | 'DATASET_NOT_LOADED';

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CardNotFoundError extends CatalogError {
  readonly key: string;

  constructor(key: string) {
    super('CARD_NOT_FOUND', 'Card not found');
    this.key = key;
  }
}

export class DatasetNotFoundError extends CatalogError {
  readonly source: string;

  constructor(source: string, options?: ErrorOptions) {
    super('DATASET_NOT_FOUND', 'Cards data file not found', options);
    this.source = source;
  }
}

export class DatasetParseError extends CatalogError {
  readonly source: string;

  constructor(source: string, message = 'Invalid JSON format in cards data', options?: ErrorOptions) {
    super('DATASET_PARSE_ERROR', message, options);
    this.source = source;
  }
}

export class DatasetNotLoadedError extends CatalogError {
  constructor() {
    super('DATASET_NOT_LOADED', 'Cards data not loaded');
  }
}

export const isCatalogError = (error: unknown): error is CatalogError => error instanceof CatalogError;
