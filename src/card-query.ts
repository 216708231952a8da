import { readCardField, type CardCatalog, type CardRecord } from './card-dataset';
import { CardNotFoundError } from './errors';

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface CardStats {
  total: number;
  types: Record<string, number>;
  rarities: Record<string, number>;
  sets: Record<string, number>;
}

type MatchField = 'type' | 'rarity' | 'set';

const UNKNOWN_LABEL = 'Unknown';

const statLabel = (card: CardRecord, field: MatchField): string => {
  const value = card[field];
  return value === undefined || value === null ? UNKNOWN_LABEL : readCardField(card, field);
};

const fold = (value: string) => value.toLowerCase();

export const buildCardKey = (setId: string, cardId: string) => `/${setId}/${cardId}`;

export const listCards = (catalog: CardCatalog, options: ListOptions = {}): CardRecord[] => {
  const { cards } = catalog.current();
  const offset = options.offset ?? 0;
  const end = options.limit === undefined ? undefined : offset + options.limit;
  return cards.slice(offset, end);
};

export const getCardByKey = (catalog: CardCatalog, setId: string, cardId: string): CardRecord => {
  const { cards, keyed } = catalog.current();
  const key = buildCardKey(setId, cardId);
  const card = cards.find((candidate) => readCardField(candidate, 'id') === key) ?? keyed.get(key);
  if (!card) {
    throw new CardNotFoundError(key);
  }
  return card;
};

export const searchCardsByName = (catalog: CardCatalog, query: string): CardRecord[] => {
  const needle = fold(query);
  return catalog.current().cards.filter((card) => fold(readCardField(card, 'name')).includes(needle));
};

const filterByField = (catalog: CardCatalog, field: MatchField, value: string): CardRecord[] => {
  const expected = fold(value);
  return catalog.current().cards.filter((card) => fold(readCardField(card, field)) === expected);
};

export const filterCardsByType = (catalog: CardCatalog, type: string) =>
  filterByField(catalog, 'type', type);

export const filterCardsByRarity = (catalog: CardCatalog, rarity: string) =>
  filterByField(catalog, 'rarity', rarity);

export const filterCardsBySet = (catalog: CardCatalog, setName: string) =>
  filterByField(catalog, 'set', setName);

const increment = (counts: Map<string, number>, label: string) => {
  counts.set(label, (counts.get(label) ?? 0) + 1);
};

export const getCardStats = (catalog: CardCatalog): CardStats => {
  const { cards } = catalog.current();
  const types = new Map<string, number>();
  const rarities = new Map<string, number>();
  const sets = new Map<string, number>();

  cards.forEach((card) => {
    increment(types, statLabel(card, 'type'));
    increment(rarities, statLabel(card, 'rarity'));
    increment(sets, statLabel(card, 'set'));
  });

  return {
    total: cards.length,
    types: Object.fromEntries(types),
    rarities: Object.fromEntries(rarities),
    sets: Object.fromEntries(sets)
  };
};
