import { once } from 'node:events';
import type { Server } from 'node:http';
import { CardCatalog, normalizeDataset, type CardRecord } from '../card-dataset';
import { createApp } from '../server';

export const makeCard = (overrides: Partial<CardRecord> = {}): CardRecord => ({
  id: '/T1/001',
  name: 'Test Card',
  type: 'Colorless',
  rarity: 'Common',
  set: 'T1',
  ...overrides
});

export const SAMPLE_CARDS: CardRecord[] = [
  makeCard({ id: '/A1/001', name: 'Pikachu', type: 'Electric', rarity: 'Common', set: 'A1' }),
  makeCard({ id: '/A1/002', name: 'Bulbasaur', type: 'Grass', rarity: 'Common', set: 'A1' }),
  makeCard({ id: '/A1/035', name: 'Charizard', type: 'Fire', rarity: 'Rare', set: 'A1', hp: 150 }),
  makeCard({ id: '/P-A/001', name: 'charmander', type: 'fire', rarity: 'Promo', set: 'Promo A' }),
  makeCard({ id: '/A1/056', name: 'Blastoise', type: 'Water', rarity: 'Rare', set: 'A1' })
];

export const catalogOf = (payload: unknown): CardCatalog => {
  const catalog = new CardCatalog();
  catalog.publish(normalizeDataset(payload, 'test'));
  return catalog;
};

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export const startServer = async (catalog: CardCatalog): Promise<RunningServer> => {
  const server: Server = createApp(catalog).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
};
