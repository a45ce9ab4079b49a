#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { glob } from 'glob';
import ora from 'ora';
import path from 'path';
import { CacheStore, FileCacheStore, MemoryCacheStore, TranslationCache } from './cache.js';
import { ENGINES, isProviderId, loadSettings, Settings } from './config.js';
import { normalizeError } from './errors.js';
import { getDefaultCacheFilePath, preview } from './helpers.js';
import { LanguageDetector } from './language-detector.js';
import { TranslationOrchestrator } from './orchestrator.js';
import { DocumentPipeline } from './pipeline/document-pipeline.js';
import { EXTRACTABLE_FORMATS, FileTextExtractor } from './pipeline/extractor.js';
import { MemoryJobStore } from './pipeline/job-store.js';
import { FileOutputWriter } from './pipeline/output.js';
import { TranslatorFactory } from './translators/factory.js';
import { isTranslationStyle, TranslateOptions, TranslationResult, TranslationStyle } from './types.js';

dotenv.config();

type GlobalOptions = {
  verbose?: boolean;
  cache: boolean;
  cacheFile: string;
};

interface LanguageOptions {
  from: string;
  to: string;
}

interface TranslateCommandOptions extends LanguageOptions {
  provider: string;
  model?: string;
  style: TranslationStyle;
  context?: string;
  json?: boolean;
}

interface CompareCommandOptions extends LanguageOptions {
  providers?: string[];
  style: TranslationStyle;
  timeout?: number;
  json?: boolean;
}

interface DocumentCommandOptions extends LanguageOptions {
  provider: string;
  chunkSize?: number;
}

// --- OPTION PARSERS ---
function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseStyle(value: string): TranslationStyle {
  if (!isTranslationStyle(value)) {
    throw new InvalidArgumentError('Expected one of natural, formal, casual, technical, literary.');
  }
  return value;
}

function parseProviderList(value: string): string[] {
  return value.split(',').map(id => id.trim()).filter(Boolean);
}

// --- WIRING ---
function createCacheStore(options: GlobalOptions): CacheStore {
  return options.cache ? new FileCacheStore(path.resolve(options.cacheFile)) : new MemoryCacheStore();
}

function createOrchestrator(settings: Settings, options: GlobalOptions): TranslationOrchestrator {
  return new TranslationOrchestrator({
    providers: TranslatorFactory.createAvailable(settings),
    cache: new TranslationCache(createCacheStore(options)),
    detector: new LanguageDetector({ timeoutMs: settings.detectionTimeoutMs }),
    settings,
  });
}

function printResult(result: TranslationResult): void {
  console.log(result.translatedText);
  console.error(
    `\n${result.providerId} (${result.model}) ${result.resolvedSourceLang} -> ${result.targetLang}`
    + ` | quality ${result.qualityScore.toFixed(1)} | ${result.processingTimeMs.toFixed(0)}ms`
  );
}

function fail(error: unknown): never {
  const payload = normalizeError(error);
  console.error(`Error [${payload.code}]: ${payload.message}`);
  process.exit(1);
}

// --- COMMANDS ---
async function translateCommand(text: string, options: TranslateCommandOptions, globals: GlobalOptions): Promise<void> {
  const settings = loadSettings();
  const orchestrator = createOrchestrator(settings, globals);
  const spinner = ora({ text: `Translating with ${options.provider}...`, isSilent: !!options.json }).start();

  const extra: TranslateOptions = {};
  if (options.context) extra.context = options.context;

  try {
    const result = await orchestrator.translate({
      text,
      sourceLang: options.from,
      targetLang: options.to,
      providerId: options.provider,
      model: options.model,
      style: options.style,
      options: extra,
    });
    spinner.succeed('Translation complete.');
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printResult(result);
    }
  } catch (error) {
    spinner.fail('Translation failed.');
    fail(error);
  }
}

async function compareCommand(text: string, options: CompareCommandOptions, globals: GlobalOptions): Promise<void> {
  const settings = loadSettings();
  const orchestrator = createOrchestrator(settings, globals);
  const providers = options.providers ?? orchestrator.getAvailableProviders();
  const spinner = ora({ text: `Comparing ${providers.join(', ')}...`, isSilent: !!options.json }).start();

  try {
    const comparison = await orchestrator.compare(text, options.from, options.to, providers, {
      timeoutMs: options.timeout,
      options: { style: options.style },
    });
    spinner.succeed(`Compared ${Object.keys(comparison.results).length} translation(s).`);

    if (options.json) {
      console.log(JSON.stringify(comparison, null, 2));
      return;
    }

    for (const [id, result] of Object.entries(comparison.results)) {
      const marker = comparison.best === result ? '*' : ' ';
      console.log(`${marker} [${id}] ${result.qualityScore.toFixed(1)}  ${result.translatedText}`);
    }
    for (const [id, message] of Object.entries(comparison.errors)) {
      console.log(`  [${id}] failed: ${message}`);
    }
    if (!comparison.best) {
      console.log('No provider produced a translation.');
    }
  } catch (error) {
    spinner.fail('Comparison failed.');
    fail(error);
  }
}

async function documentCommand(patterns: string[], options: DocumentCommandOptions, globals: GlobalOptions): Promise<void> {
  const settings = loadSettings();
  const orchestrator = createOrchestrator(settings, globals);
  const spinner = ora('Collecting files...').start();

  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { nodir: true, absolute: true });
    matches.forEach(file => files.add(file));
  }
  const supported = Array.from(files).filter(file => {
    const ext = path.extname(file).slice(1).toLowerCase();
    return EXTRACTABLE_FORMATS.some(format => format === ext);
  });

  if (supported.length === 0) {
    spinner.fail(`No ${EXTRACTABLE_FORMATS.join('/')} files found matching the input patterns.`);
    process.exit(1);
  }
  spinner.info(`Found ${supported.length} file(s) to translate.`);

  let current = '';
  const pipeline = new DocumentPipeline({
    translator: orchestrator,
    store: new MemoryJobStore(),
    extractor: new FileTextExtractor(),
    output: new FileOutputWriter(),
    chunkSize: options.chunkSize ?? settings.chunkSize,
    onProgress: job => {
      if (job.status === 'processing') {
        spinner.text = `${current}: ${job.progress}% (${job.totalChunks} chunk(s))`;
      }
    },
  });

  let failures = 0;
  for (const file of supported) {
    current = path.basename(file);
    spinner.start(`${current}: starting...`);

    const started = await pipeline.startJob({
      sourcePath: file,
      sourceLang: options.from,
      targetLang: options.to,
      providerId: options.provider,
    });
    const job = await pipeline.waitForJob(started.jobId);

    if (job?.status === 'completed') {
      const failedChunks = job.chunks.filter(chunk => chunk.status === 'failed').length;
      const note = failedChunks > 0 ? ` (${failedChunks} chunk(s) left untranslated)` : '';
      spinner.succeed(`${current} -> ${job.outputPath ?? '(no output)'}${note}`);
    } else {
      failures++;
      spinner.fail(`${current}: ${job?.errorMessage ?? 'job did not finish'}`);
    }
  }

  if (failures > 0) process.exit(1);
}

async function detectCommand(text: string): Promise<void> {
  const settings = loadSettings();
  const detector = new LanguageDetector({ timeoutMs: settings.detectionTimeoutMs });
  const result = await detector.detectWithConfidence(text);
  console.log(`${result.language} (${(result.probability * 100).toFixed(1)}%) "${preview(text)}"`);
}

async function providersCommand(): Promise<void> {
  const settings = loadSettings();
  console.log('Checking available translation providers...\n');
  const providers = await TranslatorFactory.listAvailableProviders(settings);
  if (providers.length > 0) {
    console.log('Available providers:');
    providers.forEach(p => console.log(`  - ${p}`));
    return;
  }

  console.log('No translation providers available.\n');
  for (const [id, engine] of Object.entries(ENGINES)) {
    if (isProviderId(id)) {
      console.log(`To use ${engine.name}: ${TranslatorFactory.credentialHint(id)}`);
    }
  }
}

function languagesCommand(): void {
  const settings = loadSettings();
  const orchestrator = createOrchestrator(settings, { cache: false, cacheFile: '' });
  for (const [code, name] of Object.entries(orchestrator.getSupportedLanguages())) {
    console.log(`${code.padEnd(8)}${name}`);
  }
}

// --- MAIN CLI LOGIC ---
async function main() {
  const settings = loadSettings();
  const program = new Command();

  program
    .name('lingua-relay')
    .version('1.0.0')
    .description('Translate text and documents through several providers, with caching, quality scoring and comparison.')
    .option('--verbose', 'Enable verbose output for debugging')
    .option('--no-cache', 'Disable the persistent translation cache')
    .option('--cache-file <path>', 'Custom cache file path', getDefaultCacheFilePath())
    .hook('preAction', command => {
      if (command.opts<GlobalOptions>().verbose) {
        process.env.TRANSLATOR_VERBOSE = 'true';
      }
    });

  program
    .command('translate')
    .description('Translate a piece of text')
    .argument('<text>', 'Text to translate')
    .option('-f, --from <lang>', 'Source language code, or auto', settings.defaultSourceLanguage)
    .option('-t, --to <lang>', 'Target language code', settings.defaultTargetLanguage)
    .option('-p, --provider <id>', 'Translation provider', 'openai')
    .option('-m, --model <model>', 'Model override for the provider')
    .option('-s, --style <style>', 'natural, formal, casual, technical or literary', parseStyle, 'natural')
    .option('--context <instructions>', 'Extra instructions passed to LLM providers')
    .option('--json', 'Print the full result as JSON')
    .action(async (text: string, options: TranslateCommandOptions, command: Command) => {
      await translateCommand(text, options, command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('compare')
    .description('Translate with several providers and pick the best result')
    .argument('<text>', 'Text to translate')
    .option('-f, --from <lang>', 'Source language code, or auto', settings.defaultSourceLanguage)
    .option('-t, --to <lang>', 'Target language code', settings.defaultTargetLanguage)
    .option('--providers <ids>', 'Comma-separated provider ids (default: all configured)', parseProviderList)
    .option('-s, --style <style>', 'natural, formal, casual, technical or literary', parseStyle, 'natural')
    .option('--timeout <ms>', 'Overall timeout in milliseconds', parsePositiveInt)
    .option('--json', 'Print the full comparison as JSON')
    .action(async (text: string, options: CompareCommandOptions, command: Command) => {
      await compareCommand(text, options, command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('document')
    .description('Translate txt, md, srt, docx or pdf files; output is written beside each source')
    .argument('<patterns...>', 'File paths or glob patterns')
    .option('-f, --from <lang>', 'Source language code, or auto', settings.defaultSourceLanguage)
    .option('-t, --to <lang>', 'Target language code', settings.defaultTargetLanguage)
    .option('-p, --provider <id>', 'Translation provider', 'openai')
    .option('--chunk-size <chars>', 'Maximum characters per chunk', parsePositiveInt)
    .action(async (patterns: string[], options: DocumentCommandOptions, command: Command) => {
      await documentCommand(patterns, options, command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('detect')
    .description('Detect the language of a piece of text')
    .argument('<text>', 'Text to inspect')
    .action(async (text: string) => {
      await detectCommand(text);
    });

  program
    .command('providers')
    .description('List translation providers with credentials configured')
    .action(providersCommand);

  program
    .command('languages')
    .description('List supported language codes')
    .action(languagesCommand);

  await program.parseAsync(process.argv);
}

main().catch(error => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(`\nAn unexpected error occurred: ${errorMessage}`);
  process.exit(1);
});
