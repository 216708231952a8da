import path from 'node:path';

const DEFAULT_DATA_PATH = path.join('data', 'cards.json');
const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '0.0.0.0';

export interface ServerSettings {
  dataPath: string;
  host: string;
  port: number;
  logLevel: string;
}

type Environment = Record<string, string | undefined>;

const selectFirstValue = (...candidates: Array<string | undefined | null>): string | null => {
  for (const candidate of candidates) {
    if (typeof candidate === 'string') {
      const trimmed = candidate.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
  }
  return null;
};

const resolvePort = (value: string | null): number => {
  if (value === null) {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT value "${value}": expected an integer between 1 and 65535`);
  }
  return port;
};

export const resolveSettings = (env: Environment = process.env, cwd = process.cwd()): ServerSettings => {
  const dataPath = selectFirstValue(env.CARDS_DATA_PATH) ?? DEFAULT_DATA_PATH;
  return {
    dataPath: path.resolve(cwd, dataPath),
    host: selectFirstValue(env.HOST) ?? DEFAULT_HOST,
    port: resolvePort(selectFirstValue(env.PORT)),
    logLevel: selectFirstValue(env.LOG_LEVEL) ?? 'info'
  };
};
