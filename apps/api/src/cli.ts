#!/usr/bin/env node
import * as readline from 'readline/promises';
import type { ItemView } from '@pzws/shared-types';
import { initializeServices, ServiceContext } from './services/service-registry';
import { FirstChoiceResolver, ModIdResolver, PromptResolver } from './services/mod-id-resolvers';
import {
  formatAddResult,
  formatBatch,
  formatCollections,
  formatDeleteResult,
  formatItemRows,
  formatRefreshResult,
  formatRemoveResult,
} from './cli/formatters';
import { OperationCancelledError, describeError } from './utils/errors';
import { logger } from './utils/logger';

const USAGE = [
  'Usage:',
  '  pzws add <url...>                 add Workshop items or collections',
  '  pzws ids                          print the Workshop ID and Mod ID lines',
  '  pzws refresh [collectionUrl...]   refresh collections (all when none given)',
  '  pzws remove-collection <url...>   delete collections and the items they added',
  '  pzws                              interactive mode',
];

const INTERACTIVE_HELP = [
  'Commands:',
  '  add <url...>            ids                     list [mods|maps|all] [search]',
  '  collections             refresh [url...]        remove <id...>',
  '  remove-collection <url...>                      q',
];

const write = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

class CliSession {
  private current: AbortController | null = null;

  constructor(private services: ServiceContext, private resolver: ModIdResolver) {}

  // Ctrl+C aborts the running command; the next prompt still works
  cancel(): boolean {
    if (!this.current) return false;
    this.current.abort();
    return true;
  }

  async run(command: string, args: string[]): Promise<boolean> {
    const controller = new AbortController();
    this.current = controller;
    const options = { resolver: this.resolver, signal: controller.signal };
    const { workshop } = this.services;

    try {
      switch (command) {
        case 'add':
          if (args.length === 0) return this.usage();
          formatBatch(await workshop.addLinks(args, options), formatAddResult).forEach(write);
          return true;
        case 'ids': {
          const lines = workshop.getIdLines();
          write(`Workshop IDs: ${lines.workshopIds}`);
          write(`Mod IDs: ${lines.modIds}`);
          return true;
        }
        case 'list': {
          const [view, ...search] = args;
          const views: ItemView[] = ['mods', 'maps', 'all'];
          const chosen = views.find((candidate) => candidate === view);
          formatItemRows(
            workshop.listItems({ view: chosen ?? 'all', search: (chosen ? search : args).join(' ') })
          ).forEach(write);
          return true;
        }
        case 'collections':
          formatCollections(workshop.listCollections()).forEach(write);
          return true;
        case 'refresh':
          formatBatch(await workshop.refreshCollections(args, options), formatRefreshResult).forEach(write);
          return true;
        case 'remove':
          if (args.length === 0) return this.usage();
          formatRemoveResult(await workshop.removeItems(args)).forEach(write);
          return true;
        case 'remove-collection':
          if (args.length === 0) return this.usage();
          formatBatch(await workshop.deleteCollections(args), formatDeleteResult).forEach(write);
          return true;
        default:
          return this.usage();
      }
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        write('Cancelled; nothing from that command was saved.');
      } else {
        write(`Error: ${describeError(error)}`);
      }
      return false;
    } finally {
      this.current = null;
    }
  }

  private usage(): boolean {
    USAGE.forEach(write);
    return false;
  }
}

async function interactive(session: CliSession, rl: readline.Interface): Promise<void> {
  INTERACTIVE_HELP.forEach(write);
  for (;;) {
    let line: string;
    try {
      line = (await rl.question('pzws> ')).trim();
    } catch (error) {
      // Input closed (Ctrl+C at the prompt or end of piped input)
      logger.debug(`Prompt closed: ${describeError(error)}`);
      return;
    }
    if (line === 'q' || line === 'quit' || line === 'exit') {
      return;
    }
    if (!line) continue;
    if (line === 'help') {
      INTERACTIVE_HELP.forEach(write);
      continue;
    }
    const [command, ...args] = line.split(/\s+/);
    await session.run(command, args);
  }
}

async function main(argv: string[]): Promise<number> {
  // Keep the terminal for command output
  logger.level = 'warn';

  const services = await initializeServices();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const resolver: ModIdResolver = process.stdin.isTTY ? new PromptResolver(rl, write) : new FirstChoiceResolver();
  const session = new CliSession(services, resolver);

  rl.on('SIGINT', () => {
    if (!session.cancel()) {
      rl.close();
    }
  });

  try {
    const [command, ...args] = argv;
    if (command === undefined) {
      await interactive(session, rl);
      return 0;
    }
    if (command === 'help' || command === '--help') {
      USAGE.forEach(write);
      return 0;
    }
    return (await session.run(command, args)) ? 0 : 1;
  } finally {
    rl.close();
    services.dispose();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('pzws failed:', error);
    process.exitCode = 1;
  });
