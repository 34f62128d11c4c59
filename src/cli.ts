#!/usr/bin/env node
import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { runAsk, runMap } from './commands.js';
import type { AskCliOptions, MapCliOptions } from './commands.js';
import { DEFAULT_CONFIG_PATH } from './config.js';
import { MAX_PAGES, MIN_PAGES } from './crawler.js';

interface OutputOptions {
  output?: string;
}

const program = new Command();

program
  .name('site-query')
  .description('Crawl a single site breadth-first and answer questions about it')
  .version('0.1.0');

function addCrawlOptions(command: Command): Command {
  return command
    .option('--max-pages <n>', `Max number of pages to crawl (${MIN_PAGES}-${MAX_PAGES})`)
    .option('--delay <ms>', 'Pause after each fetched page, in milliseconds')
    .option('--timeout <ms>', 'Per-request timeout, in milliseconds')
    .option('--user-agent <ua>', 'User-Agent header sent with every request')
    .option('--config <path>', 'Path to site-query.config.json', DEFAULT_CONFIG_PATH)
    .option('--output <path>', 'Write the result to this path (default: stdout)')
    .option('--quiet', 'Do not log crawl progress to stderr');
}

async function emit(text: string, opts: OutputOptions): Promise<void> {
  if (opts.output) {
    await writeFile(opts.output, text, 'utf-8');
    console.error(`Written to ${opts.output}`);
  } else {
    process.stdout.write(text);
  }
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

addCrawlOptions(
  program
    .command('map')
    .description('Crawl the site and print every page with its outbound links')
    .argument('[url]', 'Seed URL (default: startUrl from the config file)')
    .option('--format <format>', 'Output format: json or text', 'json'),
).action(async (url: string | undefined, opts: MapCliOptions & OutputOptions) => {
  await runAction(async () => emit(await runMap(url, opts), opts));
});

addCrawlOptions(
  program
    .command('ask')
    .description('Crawl the site and answer a question about it (publications, Google Scholar link, summary)')
    .argument('<prompt>', 'What to look for')
    .option('--url <url>', 'Seed URL (default: startUrl from the config file)'),
).action(async (prompt: string, opts: AskCliOptions & OutputOptions) => {
  await runAction(async () => emit(await runAsk(prompt, opts), opts));
});

await program.parseAsync();
