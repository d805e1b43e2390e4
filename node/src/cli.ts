// Command-line entry point: start the server, run one-off searches and questions, or chat.
import 'dotenv/config';

import { Command } from 'commander';
import { createInterface } from 'readline/promises';

import { loadConfig, type AppConfig } from '@/config/app.config';
import { createPipelineDeps, type PipelineDeps } from '@/services/pipeline-deps';
import { describeCriteria, isUnconstrained } from '@/services/search-criteria';
import { formatFlightsList } from '@/utils/formatFlights';
import { isTravelAssistantError } from '@/utils/errors';
import { createApp } from './app';

const DEBUG = Boolean(process.env.DEBUG);

const CHAT_HELP = [
  'Ask about flights or travel policy, for example:',
  '  Find me a round-trip to Tokyo in November with Star Alliance, avoiding overnight layovers',
  '  Can UAE passport holders visit Japan without a visa?',
  'Commands: help, quit (or exit)',
].join('\n');

function formatCliError(err: unknown): string {
  if (isTravelAssistantError(err)) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

async function withDeps<T>(run: (deps: PipelineDeps, config: AppConfig) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const deps = await createPipelineDeps(config);
  return run(deps, config);
}

const program = new Command();

program
  .name('travel-assistant')
  .description('Flight search and travel policy Q&A')
  .version('1.0.0');

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port to listen on (overrides PORT)')
  .action(async (opts: { port?: string }) => {
    const config = loadConfig(opts.port ? { ...process.env, PORT: opts.port } : process.env);
    const deps = await createPipelineDeps(config);
    createApp(deps, config).listen(config.port, () => {
      console.log(`Listening on http://localhost:${config.port}`);
    });
  });

program
  .command('flights <query...>')
  .description('Search the flight catalog with a free-text request')
  .option('--json', 'Output as JSON')
  .option('--limit <n>', 'Maximum flights to print')
  .action(async (words: string[], opts: { json?: boolean; limit?: string }) => {
    await withDeps(async ({ assistant }, config) => {
      const { criteria, flights } = assistant.searchFlights(words.join(' '));
      if (opts.json) {
        console.log(JSON.stringify({ criteria, flights }, null, 2));
        return;
      }
      const limit = opts.limit ? parseInt(opts.limit, 10) : config.maxDisplayedFlights;
      if (!isUnconstrained(criteria)) console.log(`Searching flights: ${describeCriteria(criteria)}.`);
      console.log(formatFlightsList(flights, Number.isInteger(limit) && limit > 0 ? limit : config.maxDisplayedFlights));
    });
  });

program
  .command('ask <question...>')
  .description('Answer a travel policy question from the indexed documents')
  .option('-k, --top-k <n>', 'Passages to retrieve')
  .option('--show-passages', 'Print the retrieved passages after the answer')
  .action(async (words: string[], opts: { topK?: string; showPassages?: boolean }) => {
    await withDeps(async ({ assistant }) => {
      const k = opts.topK ? parseInt(opts.topK, 10) : undefined;
      const { answer, passages } = await assistant.answerPolicyQuestion(words.join(' '), k);
      console.log(answer);
      if (opts.showPassages) {
        passages.forEach(({ chunk, score }, i) => {
          console.log(`\n[${i + 1}] ${chunk.source} #${chunk.index} (score ${score.toFixed(3)})`);
          console.log(chunk.text);
        });
      }
    });
  });

program
  .command('chat')
  .description('Interactive session; each line is routed to flight search or policy Q&A')
  .action(async () => {
    await withDeps(async ({ dispatcher }) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      console.log(CHAT_HELP);
      try {
        for (;;) {
          const line = (await rl.question('\n> ')).trim();
          if (!line) continue;
          const command = line.toLowerCase();
          if (command === 'quit' || command === 'exit') break;
          if (command === 'help') {
            console.log(CHAT_HELP);
            continue;
          }
          try {
            const result = await dispatcher.dispatch(line);
            console.log(result.message);
          } catch (err) {
            // One failed turn does not end the session.
            console.error(`Error: ${formatCliError(err)}`);
          }
        }
      } finally {
        rl.close();
      }
    });
  });

program
  .command('index')
  .description('Rebuild the policy vector store from the configured documents')
  .action(async () => {
    const config = loadConfig();
    const { assistant } = await createPipelineDeps(config, { rebuildIndex: true });
    console.log(`Indexed policy documents into ${config.vectorStorePath}`);
    console.log(`Catalog: ${assistant.catalog.size} flights`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err)}`);
  if (DEBUG && err instanceof Error && err.stack) {
    console.error(`\nStack trace:\n${err.stack}`);
  }
  process.exit(1);
});
