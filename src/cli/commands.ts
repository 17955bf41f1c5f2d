import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { JsonlLedger } from '../billing/ledger.js';
import { loadConfig, logFilePath, type AppConfig } from '../config/settings.js';
import { NotionRagApi } from '../api/server.js';
import type { BillingPeriod } from '../schemas/index.js';
import { NotionRagService } from '../service.js';
import { createLogger } from '../utils/logger.js';
import {
  billingLines,
  documentListLines,
  initSummaryLines,
  queryLines,
  storeListLines,
  syncSummaryLines,
} from './format.js';

interface Context {
  config: AppConfig;
  ledger: JsonlLedger;
  service: NotionRagService;
}

async function openContext(): Promise<Context> {
  const config = await loadConfig();
  const ledger = new JsonlLedger(path.resolve(config.settings.logDir));
  return { config, ledger, service: new NotionRagService({ config, ledger }) };
}

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

/** Aborts at the next page boundary on the first Ctrl+C. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nStopping after the current page...');
    controller.abort();
  });
  return controller.signal;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Initialize and index a Notion database')
    .argument('[name]', 'Database label (auto-detected if omitted)')
    .argument('[db_url]', 'Notion database URL (first-time registration)')
    .action(async (name: string | undefined, dbUrl: string | undefined) => {
      const { service } = await openContext();
      const result = await service.init(name, dbUrl, { signal: interruptSignal() });
      print([...initSummaryLines(result), '', 'Done.']);
    });
}

export function syncCommand(): Command {
  return new Command('sync')
    .description('Sync database, re-indexing changed pages')
    .argument('[name]', 'Database label (auto-detected if omitted)')
    .option('--force', 'Force re-index all pages', false)
    .action(async (name: string | undefined, options: { force: boolean }) => {
      const { service } = await openContext();
      const result = await service.sync(name, options.force, { signal: interruptSignal() });
      print([...syncSummaryLines(result), '', 'Done.']);
    });
}

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP API server')
    .option('--host <host>', 'Host to bind')
    .option('--port <port>', 'Port to bind', parsePort)
    .action(async (options: { host?: string; port?: number }) => {
      const { config, ledger, service } = await openContext();
      const api = new NotionRagApi({
        service,
        ledger,
        host: options.host ?? config.settings.server.host,
        port: options.port ?? config.settings.server.port,
        logger: createLogger({ name: 'api', level: config.settings.logLevel, logFile: logFilePath(config) }),
      });
      await api.start();

      process.once('SIGINT', () => {
        console.log('\nShutting down...');
        api.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error(error instanceof Error ? error.message : 'Unknown error');
            process.exit(1);
          }
        );
      });
    });
}

export function queryCommand(): Command {
  return new Command('query')
    .description('Query a Notion database')
    .argument('<name_or_query>', 'Database label or query text')
    .argument('[query]', 'Query text (if label is provided)')
    .option('--model <model>', 'Model to use')
    .action(async (nameOrQuery: string, query: string | undefined, options: { model?: string }) => {
      const { config, service } = await openContext();
      const [label, text] = query === undefined ? [undefined, nameOrQuery] : [nameOrQuery, query];
      const result = await service.query(label, text, { model: options.model, source: 'cli' });
      print(queryLines(text, result, config.pricing[result.usage.model] ?? [0, 0]));
    });
}

export function listCommand(): Command {
  return new Command('list')
    .description('List documents in a store or all Notion stores')
    .argument('[name]', 'Database label (optional)')
    .action(async (name: string | undefined) => {
      const { service } = await openContext();
      if (name) {
        const { store, documents } = await service.listDocuments(name);
        print(documentListLines(store, documents));
      } else {
        print(storeListLines(await service.listStores()));
      }
    });
}

export function removeCommand(): Command {
  return new Command('remove')
    .description('Remove a document from a store')
    .argument('<name_or_page_id>', 'Database label or page ID')
    .argument('[page_id]', 'Page ID (if label is provided)')
    .action(async (nameOrPageId: string, pageId: string | undefined) => {
      const { service } = await openContext();
      const [label, target] = pageId === undefined ? [undefined, nameOrPageId] : [nameOrPageId, pageId];
      const removed = await service.removePage(label, target);
      print([`Deleted: ${removed.displayName}`, 'Done.']);
    });
}

export function cleanupCommand(): Command {
  return new Command('cleanup')
    .description('Delete a store and all documents')
    .argument('[name]', 'Database label (auto-detected if omitted)')
    .action(async (name: string | undefined) => {
      const { service } = await openContext();
      const result = await service.cleanup(name);
      print([`Deleted store '${result.label}' (${result.documents} documents)`, 'Done.']);
    });
}

export function billingCommand(): Command {
  return new Command('billing')
    .description('Show Gemini API billing summary')
    .option('--monthly', 'Show monthly breakdown', false)
    .option('--daily', 'Show daily breakdown', false)
    .action(async (options: { monthly: boolean; daily: boolean }) => {
      const { service } = await openContext();
      const period: BillingPeriod = options.monthly ? 'monthly' : options.daily ? 'daily' : 'total';
      print(billingLines(await service.billing(period), period));
    });
}

export function buildProgram(): Command {
  return new Command()
    .name('notion-rag')
    .description('Index and query Notion databases with Gemini File Search')
    .version('0.1.0')
    .addCommand(initCommand())
    .addCommand(syncCommand())
    .addCommand(serveCommand())
    .addCommand(queryCommand())
    .addCommand(listCommand())
    .addCommand(removeCommand())
    .addCommand(cleanupCommand())
    .addCommand(billingCommand());
}
