import { Logger } from '@nestjs/common';
import type { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { loadAnalyzerConfig } from './config/analyzer-config.js';
import type { AnalyzerConfig } from './config/analyzer-config.js';
import { ConfigurationError } from './config/configuration.error.js';
import { AnalysisPipelineService, formatSummary } from './pipeline/pipeline.service.js';

const logger = new Logger('Main');

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  /** Boots the application context for validated settings. */
  createContext?: (config: AnalyzerConfig) => Promise<INestApplicationContext>;
  exit?: (code: number) => void;
  print?: (line: string) => void;
  /** Source of SIGINT; the process by default. */
  signals?: NodeJS.EventEmitter;
}

export function logLevels(env: NodeJS.ProcessEnv = process.env): LogLevel[] {
  const levels: LogLevel[] = ['error', 'warn', 'log'];
  if (env.LOG_LEVEL === 'debug') levels.push('debug', 'verbose');
  return levels;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One analyzer run from banner to exit code: validate settings, boot the
 * context, run the pipeline, print the summary. The context is closed on
 * every path, which releases the GitHub client.
 */
export async function runCli(options: CliOptions = {}): Promise<void> {
  const env = options.env ?? process.env;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const print = options.print ?? ((line: string) => console.log(line));
  const signals = options.signals ?? process;
  const createContext =
    options.createContext ??
    ((config: AnalyzerConfig) =>
      NestFactory.createApplicationContext(AppModule.forConfig(config), {
        logger: logLevels(env),
        abortOnError: false,
      }));

  let context: INestApplicationContext | undefined;

  const onInterrupt = () => {
    logger.warn('⚠️ Analysis interrupted by user');
    void (context ? context.close() : Promise.resolve())
      .catch((err: unknown) => logger.error(`Shutdown failed: ${errorMessage(err)}`))
      .finally(() => exit(1));
  };
  signals.once('SIGINT', onInterrupt);

  print('🚀 GitHub Organization Analyzer');
  try {
    // Checked before Nest boots: a ConfigurationError never reaches its ExceptionHandler.
    const config = loadAnalyzerConfig(env);
    const app = await createContext(config);
    context = app;
    try {
      const { stats } = await app.get(AnalysisPipelineService).run();
      print('');
      for (const line of formatSummary(stats)) print(line);
    } finally {
      await app.close();
    }
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      logger.error(`❌ Fatal error: ${err.message}`);
    } else {
      logger.error(`❌ Error during analysis: ${errorMessage(err)}`);
    }
    exit(1);
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
  }
}
