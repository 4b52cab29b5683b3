import { Command } from 'commander';
import { z } from 'zod';
import type { ParserConfig } from './config';

const cliSchema = z.object({
  sources: z.array(z.string().min(1)).min(1),
  regions: z.array(z.string().min(1)).min(1),
  maxPages: z.coerce.number().int().positive(),
  selenium: z.boolean(),
  seleniumVisible: z.boolean(),
  output: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof cliSchema>;

export function buildProgram(): Command {
  return new Command()
    .name('cottage-village-leads')
    .description('Collect cottage-village contacts from listing sites into a CSV lead table')
    .option('-s, --sources <names...>', 'cian, avito, domclick, yandex, cottage, poselki', ['cian'])
    .option('-r, --regions <names...>', 'region slugs for regional sources', ['moskovskaya-oblast'])
    .option('-p, --max-pages <n>', 'listing pages per source and region', '3')
    .option('--no-selenium', 'disable the headless-browser phone fallback')
    .option('--selenium-visible', 'show the browser window', false)
    .option('-o, --output <file>', 'output CSV (overrides OUTPUT_CSV)')
    .option('--log-file <file>', 'log file (overrides LOG_FILE)');
}

/**
 * Parses process-style argv (node, script, ...flags).
 */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const program = buildProgram();
  program.parse([...argv]);
  return cliSchema.parse(program.opts());
}

export function applyCliOverrides(config: ParserConfig, cli: CliOptions): ParserConfig {
  return {
    ...config,
    outputCsv: cli.output ?? config.outputCsv,
    logFile: cli.logFile ?? config.logFile,
    useBrowser: cli.selenium,
    browserHeadless: !cli.seleniumVisible,
  };
}
