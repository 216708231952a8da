import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import logger from './logger';
import type { CardCatalog, CardRecord } from './card-dataset';
import {
  filterCardsByRarity,
  filterCardsBySet,
  filterCardsByType,
  getCardByKey,
  getCardStats,
  listCards,
  searchCardsByName
} from './card-query';
import { isCatalogError, type CatalogErrorCode } from './errors';

const MAX_PAGE_LIMIT = 1000;

// Query values arrive as strings; only plain decimal digits count as integers.
const integerParam = z.string().regex(/^\d+$/, 'Expected a non-negative integer');

const listQuerySchema = z.object({
  limit: integerParam.pipe(z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT)).optional(),
  offset: integerParam.pipe(z.coerce.number().int().min(0)).default('0')
});

const STATUS_BY_CODE: Record<CatalogErrorCode, number> = {
  CARD_NOT_FOUND: 404,
  DATASET_NOT_LOADED: 503,
  DATASET_NOT_FOUND: 500,
  DATASET_PARSE_ERROR: 500
};

const handleCatalogError = (req: Request, res: Response, error: unknown) => {
  if (isCatalogError(error)) {
    const statusCode = STATUS_BY_CODE[error.code];
    if (statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed`, { error });
    }
    res.status(statusCode).json({ error: error.message });
    return;
  }
  logger.error(`${req.method} ${req.path} failed`, { error });
  res.status(500).json({ error: 'Internal server error' });
};

const respondWith = (producer: (req: Request) => CardRecord | CardRecord[]) => (req: Request, res: Response) => {
  try {
    res.json(producer(req));
  } catch (error) {
    handleCatalogError(req, res, error);
  }
};

export const createCardRouter = (catalog: CardCatalog): Router => {
  const router = Router();

  router.get('/cards', (req: Request, res: Response) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(422).json({
        error: 'Invalid query parameters',
        details: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message
        }))
      });
      return;
    }
    try {
      res.json(listCards(catalog, parsed.data));
    } catch (error) {
      handleCatalogError(req, res, error);
    }
  });

  router.get(
    '/cards/search/name/:name',
    respondWith((req) => searchCardsByName(catalog, req.params.name))
  );

  router.get(
    '/cards/filter/type/:type',
    respondWith((req) => filterCardsByType(catalog, req.params.type))
  );

  router.get(
    '/cards/filter/rarity/:rarity',
    respondWith((req) => filterCardsByRarity(catalog, req.params.rarity))
  );

  router.get(
    '/cards/filter/set/:setName',
    respondWith((req) => filterCardsBySet(catalog, req.params.setName))
  );

  router.get(
    '/cards/:setId/:cardId',
    respondWith((req) => getCardByKey(catalog, req.params.setId, req.params.cardId))
  );

  router.get('/stats', (req: Request, res: Response) => {
    try {
      const { total, types, rarities, sets } = getCardStats(catalog);
      res.json({ total_cards: total, types, rarities, sets });
    } catch (error) {
      handleCatalogError(req, res, error);
    }
  });

  return router;
};
