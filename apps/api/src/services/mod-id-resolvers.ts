import type { Interface as ReadlineInterface } from 'readline/promises';
import type { ModIdSelectionRequest, WorkshopItemDetails } from '@pzws/shared-types';
import { OperationCancelledError } from '../utils/errors';
import { logger } from '../utils/logger';

export type ModIdChoice = { kind: 'chosen'; modIds: string[] } | { kind: 'skip' };

/**
 * Decides which mod ID(s) to use for an item whose page lists several.
 */
export interface ModIdResolver {
  resolve(request: ModIdSelectionRequest, signal?: AbortSignal): ModIdChoice | Promise<ModIdChoice>;
}

export type ModIdResolution =
  | { kind: 'resolved'; modIds: string[] }
  | { kind: 'skipped'; request: ModIdSelectionRequest };

function pickFromOptions(options: string[], wanted: string[]): string[] | null {
  const byKey = new Map(options.map((option) => [option.toLowerCase(), option]));
  const picked: string[] = [];
  for (const choice of wanted) {
    const match = byKey.get(choice.trim().toLowerCase());
    if (!match) return null;
    if (!picked.includes(match)) picked.push(match);
  }
  return picked.length > 0 ? picked : null;
}

/**
 * Zero or one option needs no decision. Otherwise a valid pre-made choice wins,
 * then the resolver. No resolver, a skip, or an empty/unknown answer all
 * mean the item is skipped.
 */
export async function resolveModIds(
  details: WorkshopItemDetails,
  chosenModIds?: string[],
  resolver?: ModIdResolver,
  signal?: AbortSignal
): Promise<ModIdResolution> {
  const options = details.modIdOptions;
  if (options.length <= 1) {
    return { kind: 'resolved', modIds: [...options] };
  }

  if (chosenModIds) {
    const picked = pickFromOptions(options, chosenModIds);
    if (picked) {
      return { kind: 'resolved', modIds: picked };
    }
    logger.warn(`[ModIds] Ignoring choice ${chosenModIds.join(', ')} for ${details.id}: not among ${options.join(', ')}`);
  }

  const request: ModIdSelectionRequest = { id: details.id, name: details.name, options: [...options] };
  if (resolver) {
    let choice: ModIdChoice;
    try {
      choice = await resolver.resolve(request, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError(`Mod ID choice for ${details.id}`);
      }
      throw error;
    }
    if (choice.kind === 'chosen') {
      const picked = pickFromOptions(options, choice.modIds);
      if (picked) {
        return { kind: 'resolved', modIds: picked };
      }
    }
  }

  logger.warn(`[ModIds] Ambiguous selection for ${details.id} (${options.join(', ')}); skipping item`);
  return { kind: 'skipped', request };
}

/**
 * Answers from a map posted by a client: Workshop ID -> mod ID(s), or null to skip.
 */
export class ChoiceMapResolver implements ModIdResolver {
  constructor(private choices: Record<string, string | string[] | null> = {}) {}

  resolve(request: ModIdSelectionRequest): ModIdChoice {
    const choice = this.choices[request.id];
    if (choice === undefined || choice === null) {
      return { kind: 'skip' };
    }
    return { kind: 'chosen', modIds: Array.isArray(choice) ? choice : [choice] };
  }
}

/** Takes the first listed mod ID. Used when nobody can be asked. */
export class FirstChoiceResolver implements ModIdResolver {
  resolve(request: ModIdSelectionRequest): ModIdChoice {
    return { kind: 'chosen', modIds: request.options.slice(0, 1) };
  }
}

/**
 * Asks on the terminal. Enter without a number skips the item.
 */
export class PromptResolver implements ModIdResolver {
  constructor(private rl: ReadlineInterface, private write: (line: string) => void) {}

  async resolve(request: ModIdSelectionRequest, signal?: AbortSignal): Promise<ModIdChoice> {
    this.write(`Multiple Mod IDs found for ${request.name} (${request.id}):`);
    request.options.forEach((option, index) => this.write(`  ${index + 1}. ${option}`));
    const prompt = 'Pick one number to add (or press Enter to skip): ';
    const answer = (await (signal ? this.rl.question(prompt, { signal }) : this.rl.question(prompt))).trim();
    const index = Number(answer);
    if (!answer || !Number.isInteger(index) || index < 1 || index > request.options.length) {
      return { kind: 'skip' };
    }
    return { kind: 'chosen', modIds: [request.options[index - 1]] };
  }
}
