import { consola, type ConsolaInstance } from 'consola';

export type Logger = ConsolaInstance;

/** Shared tagged logger; callers may inject their own instance instead. */
export const logger: Logger = consola.withTag('loadout-forge');

export function childLogger(tag: string, parent: Logger = logger): Logger {
  return parent.withTag(tag);
}
