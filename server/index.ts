import 'dotenv/config';
import { applyCliOverrides, parseCliOptions } from './cli';
import { loadConfig } from './config';
import { PipelineContext } from './context';
import { createLogger, errorMessage } from './logger';
import { VillagePipeline } from './pipeline';
import { BrowserPhoneExtractor } from './services/browser-phone';
import { VillageCsvStorage } from './storage';

async function main(): Promise<void> {
  const cli = parseCliOptions(process.argv);
  const config = applyCliOverrides(loadConfig(), cli);
  const logger = createLogger({ level: config.logLevel, filePath: config.logFile, source: 'parser' });

  const ctx = new PipelineContext({ config, logger });
  const storage = new VillageCsvStorage(config.outputCsv, logger.child('storage'));
  const browser = config.useBrowser
    ? new BrowserPhoneExtractor({
        headless: config.browserHeadless,
        executablePath: config.chromiumPath,
        pageLoadTimeoutMs: config.pageLoadTimeoutMs,
        logger: logger.child('browser'),
      })
    : null;

  // First Ctrl+C finishes the current page and saves; a second one exits at once
  const onSigint = () => {
    if (ctx.aborted) {
      logger.warn('⛔ Second interrupt, exiting without saving');
      process.exit(130);
    }
    logger.warn('⏹️ Interrupt received, stopping after the current page');
    ctx.abort();
  };
  process.on('SIGINT', onSigint);

  logger.info(`🚀 Sources: ${cli.sources.join(', ')} | regions: ${cli.regions.join(', ')} | pages: ${cli.maxPages}`);
  logger.info(`⚙️ Browser fallback: ${config.useBrowser ? `on (max ${config.maxBrowserPhoneAttempts})` : 'off'} | output: ${config.outputCsv}`);

  try {
    const summary = await new VillagePipeline(ctx, { storage, browser }).run({
      sources: cli.sources,
      regions: cli.regions,
      maxPages: cli.maxPages,
    });
    logger.info(`✅ Done: ${summary.merged} villages this run, ${summary.targets} targets`);
    process.exitCode = summary.interrupted ? 130 : 0;
  } catch (error) {
    logger.error(`❌ Run failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
    await logger.close();
  }
}

main().catch((error: unknown) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exitCode = 1;
});
