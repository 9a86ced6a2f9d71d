import * as readline from 'readline/promises';
import { PassThrough } from 'stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  ChoiceMapResolver,
  FirstChoiceResolver,
  ModIdResolver,
  PromptResolver,
  resolveModIds,
} from './mod-id-resolvers';
import { OperationCancelledError } from '../utils/errors';
import { itemDetails } from '../testing/fixtures';

const ambiguous = itemDetails('501', { name: 'Twin Mod', modIdOptions: ['TwinA', 'TwinB', 'TwinC'] });

describe('resolveModIds', () => {
  it('needs no decision for zero or one option', async () => {
    const resolver: ModIdResolver = { resolve: vi.fn() };

    expect(await resolveModIds(itemDetails('1'), undefined, resolver)).toEqual({ kind: 'resolved', modIds: ['mod1'] });
    expect(await resolveModIds(itemDetails('2', { modIdOptions: [] }), undefined, resolver)).toEqual({
      kind: 'resolved',
      modIds: [],
    });
    expect(resolver.resolve).not.toHaveBeenCalled();
  });

  it('uses a valid pre-made choice, matched case-insensitively', async () => {
    expect(await resolveModIds(ambiguous, ['twinc', 'TWINA', 'twina'])).toEqual({
      kind: 'resolved',
      modIds: ['TwinC', 'TwinA'],
    });
  });

  it('falls back to the resolver when the pre-made choice is not an option', async () => {
    const result = await resolveModIds(ambiguous, ['Other'], new FirstChoiceResolver());
    expect(result).toEqual({ kind: 'resolved', modIds: ['TwinA'] });
  });

  it('skips without a resolver', async () => {
    expect(await resolveModIds(ambiguous)).toEqual({
      kind: 'skipped',
      request: { id: '501', name: 'Twin Mod', options: ['TwinA', 'TwinB', 'TwinC'] },
    });
  });

  it('skips when the resolver answers with something unknown', async () => {
    const resolver: ModIdResolver = { resolve: () => ({ kind: 'chosen', modIds: ['Nope'] }) };
    const result = await resolveModIds(ambiguous, undefined, resolver);
    expect(result.kind).toBe('skipped');
  });

  it('turns a resolver failure after an abort into a cancellation', async () => {
    const controller = new AbortController();
    const resolver: ModIdResolver = {
      resolve: () => {
        controller.abort();
        return Promise.reject(new Error('prompt closed'));
      },
    };

    await expect(resolveModIds(ambiguous, undefined, resolver, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });

  it('passes other resolver failures through', async () => {
    const resolver: ModIdResolver = { resolve: () => Promise.reject(new Error('prompt closed')) };

    await expect(resolveModIds(ambiguous, undefined, resolver, new AbortController().signal)).rejects.toThrow(
      'prompt closed'
    );
  });
});

describe('ChoiceMapResolver', () => {
  const request = { id: '501', name: 'Twin Mod', options: ['TwinA', 'TwinB'] };

  it('returns a single or multiple choice', () => {
    expect(new ChoiceMapResolver({ '501': 'TwinB' }).resolve(request)).toEqual({ kind: 'chosen', modIds: ['TwinB'] });
    expect(new ChoiceMapResolver({ '501': ['TwinA', 'TwinB'] }).resolve(request)).toEqual({
      kind: 'chosen',
      modIds: ['TwinA', 'TwinB'],
    });
  });

  it('skips on null or a missing entry', () => {
    expect(new ChoiceMapResolver({ '501': null }).resolve(request)).toEqual({ kind: 'skip' });
    expect(new ChoiceMapResolver().resolve(request)).toEqual({ kind: 'skip' });
  });
});

describe('PromptResolver', () => {
  let rl: readline.Interface | null = null;

  afterEach(() => {
    rl?.close();
    rl = null;
  });

  function prompt(answer: string) {
    const input = new PassThrough();
    rl = readline.createInterface({ input, output: new PassThrough(), terminal: false });
    const lines: string[] = [];
    const resolver = new PromptResolver(rl, (line) => lines.push(line));
    const pending = resolver.resolve({ id: '501', name: 'Twin Mod', options: ['TwinA', 'TwinB', 'TwinC'] });
    input.write(`${answer}\n`);
    return { pending, lines };
  }

  it('lists the options and returns the numbered one', async () => {
    const { pending, lines } = prompt('2');

    expect(await pending).toEqual({ kind: 'chosen', modIds: ['TwinB'] });
    expect(lines).toEqual(['Multiple Mod IDs found for Twin Mod (501):', '  1. TwinA', '  2. TwinB', '  3. TwinC']);
  });

  it('skips on an empty answer', async () => {
    expect(await prompt('').pending).toEqual({ kind: 'skip' });
  });

  it('skips on a number out of range', async () => {
    expect(await prompt('7').pending).toEqual({ kind: 'skip' });
  });

  it('stops waiting for an answer once the signal aborts', async () => {
    rl = readline.createInterface({ input: new PassThrough(), output: new PassThrough(), terminal: false });
    const controller = new AbortController();
    const resolver = new PromptResolver(rl, () => undefined);

    const pending = resolveModIds(ambiguous, undefined, resolver, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
