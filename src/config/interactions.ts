/**
 * Interaction table: which controls to click to dismiss popups, go to the
 * next page or load more items, per origin.
 *
 * The default table ships in config/interactions.json; INTERACTIONS_PATH
 * points at a replacement.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import defaultTableJson from '../../config/interactions.json';
import type { SelectorDescriptor } from '../types/render.types';
import { ConfigError, errorMessage } from '../utils/errors';

const DEFAULT_TAGS = ['button', 'a'];

const tagsSchema = z.array(z.string().min(1)).min(1).default(DEFAULT_TAGS);

const entrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string().min(1), tags: tagsSchema }),
  z.object({ type: z.literal('texts'), texts: z.array(z.string().min(1)), tags: tagsSchema }),
  z.object({ type: z.literal('css'), selector: z.string().min(1) }),
]);

const controlsSchema = z.object({
  dismiss: z.array(entrySchema).default([]),
  next: z.array(entrySchema).default([]),
  loadMore: z.array(entrySchema).default([]),
});

const tableSchema = z.record(controlsSchema);

type TableEntry = z.infer<typeof entrySchema>;
export type InteractionTable = z.infer<typeof tableSchema>;

export type ControlKind = 'dismiss' | 'next' | 'loadMore';

export type ResolvedInteractions = Record<ControlKind, SelectorDescriptor[]>;

export const WILDCARD_ORIGIN = '*';

export function parseInteractionTable(input: unknown, source = 'interactions'): InteractionTable {
  const parsed = tableSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid interaction table', source, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Load the interaction table from `filePath`, or the bundled default
 */
export async function loadInteractionTable(filePath = process.env.INTERACTIONS_PATH): Promise<InteractionTable> {
  if (!filePath) {
    return parseInteractionTable(defaultTableJson, 'config/interactions.json');
  }

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read interaction table: ${errorMessage(error)}`, filePath);
  }

  try {
    return parseInteractionTable(JSON.parse(raw), filePath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Interaction table is not valid JSON: ${errorMessage(error)}`, filePath);
  }
}

/**
 * Descriptors for an origin: its own entries first, then the wildcard defaults
 */
export function resolveInteractions(table: InteractionTable, origin: string): ResolvedInteractions {
  const site = origin !== WILDCARD_ORIGIN ? table[origin] : undefined;
  const fallback = table[WILDCARD_ORIGIN];

  const pick = (kind: ControlKind): SelectorDescriptor[] =>
    [...(site?.[kind] ?? []), ...(fallback?.[kind] ?? [])].flatMap(expandEntry);

  return {
    dismiss: pick('dismiss'),
    next: pick('next'),
    loadMore: pick('loadMore'),
  };
}

function expandEntry(entry: TableEntry): SelectorDescriptor[] {
  switch (entry.type) {
    case 'text':
      return [{ type: 'text', text: entry.text, tags: entry.tags }];
    case 'texts':
      return entry.texts.map((text) => ({ type: 'text', text, tags: entry.tags }));
    case 'css':
      return [{ type: 'css', selector: entry.selector }];
  }
}
