import { createConsola } from 'consola';

const DEFAULT_LEVEL = 3;

function resolveLevel(raw: string | undefined): number {
  if (!raw) {
    return DEFAULT_LEVEL;
  }

  const level = Number(raw);

  return Number.isInteger(level) ? level : DEFAULT_LEVEL;
}

export const logger = createConsola({
  level: resolveLevel(process.env.DESKNOTE_LOG_LEVEL),
}).withTag('desknote');
