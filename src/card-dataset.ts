import fs from 'node:fs';
import logger from './logger';
import { DatasetNotFoundError, DatasetNotLoadedError, DatasetParseError } from './errors';

export type CardField = 'id' | 'name' | 'type' | 'rarity' | 'set';

/**
 * One card as found in the source document. The known fields are read through
 * `readCardField`; their stored values are not checked, and any other keys are
 * passed through untouched.
 */
export type CardRecord = Partial<Record<CardField, unknown>> & Record<string, unknown>;

export type CardShape = 'list' | 'cards-key' | 'keyed';

export interface CardDataset {
  readonly cards: readonly CardRecord[];
  /** Records by the object key they were stored under, for keyed sources only. */
  readonly keyed: ReadonlyMap<string, CardRecord>;
  readonly shape: CardShape;
  readonly source: string;
  readonly loadedAt: string;
}

export type DatasetReader = (source: string) => Promise<string>;

const defaultReader: DatasetReader = (source) => fs.promises.readFile(source, 'utf-8');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Text of a known field: absent or null reads as `""`, numbers and booleans as their string form. */
export const readCardField = (card: CardRecord, field: CardField): string => {
  const value = card[field];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
};

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

const collectRecords = (entries: unknown[], source: string): CardRecord[] => {
  const records: CardRecord[] = [];
  entries.forEach((entry, index) => {
    if (isRecord(entry)) {
      records.push(entry);
      return;
    }
    logger.warn('Skipping non-object card entry', { source, index });
  });
  return records;
};

const buildDataset = (
  cards: CardRecord[],
  shape: CardShape,
  source: string,
  keyed = new Map<string, CardRecord>()
): CardDataset => {
  const dataset: CardDataset = {
    cards: Object.freeze(cards),
    keyed,
    shape,
    source,
    loadedAt: new Date().toISOString()
  };
  return Object.freeze(dataset);
};

export const normalizeDataset = (payload: unknown, source = '<memory>'): CardDataset => {
  if (Array.isArray(payload)) {
    return buildDataset(collectRecords(payload, source), 'list', source);
  }

  if (!isRecord(payload)) {
    throw new DatasetParseError(source, 'Cards data must be a JSON array or object');
  }

  const { cards } = payload;
  if (Array.isArray(cards)) {
    return buildDataset(collectRecords(cards, source), 'cards-key', source);
  }

  const keyed = new Map<string, CardRecord>();
  const records: CardRecord[] = [];
  Object.entries(payload).forEach(([key, value], index) => {
    if (!isRecord(value)) {
      logger.warn('Skipping non-object card entry', { source, index, key });
      return;
    }
    keyed.set(key, value);
    records.push(value);
  });

  return buildDataset(records, 'keyed', source, keyed);
};

export const loadDataset = async (
  source: string,
  reader: DatasetReader = defaultReader
): Promise<CardDataset> => {
  let content: string;
  try {
    content = await reader(source);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new DatasetNotFoundError(source, { cause: error });
    }
    throw error;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new DatasetParseError(source, undefined, { cause: error });
  }

  const dataset = normalizeDataset(payload, source);
  logger.info(`Loaded ${dataset.cards.length} cards`, { source, shape: dataset.shape });
  return dataset;
};

/**
 * Holds the dataset for the serving context. It is published once, after the
 * loader succeeds, and read by every query afterwards.
 */
export class CardCatalog {
  private dataset: CardDataset | null = null;

  publish(dataset: CardDataset): void {
    if (this.dataset) {
      throw new Error('Card dataset has already been published');
    }
    this.dataset = dataset;
  }

  isLoaded(): boolean {
    return this.dataset !== null;
  }

  current(): CardDataset {
    if (!this.dataset) {
      throw new DatasetNotLoadedError();
    }
    return this.dataset;
  }
}
