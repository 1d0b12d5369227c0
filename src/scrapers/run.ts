#!/usr/bin/env node
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { loadSeedFile, parseKeywordList, seedFromEnv, type Seed } from '../core/seed.js';
import { RunLog } from '../db/queries.js';
import { openDatabase } from '../db/schema.js';
import { CorpusCollector, joinKeywords } from './collector.js';
import { ArchiveDiagnostics, writeDiagnostics } from './diagnostics.js';
import { SubredditDiscoverer } from './discovery.js';
import { ArchiveRetriever } from './retriever.js';
import { CommunityValidator } from './validator.js';

const COMMANDS = ['collect', 'discover', 'diagnose'] as const;
type CommandName = typeof COMMANDS[number];

function isCommand(value: string | undefined): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function userKeywords(): string[] {
  return [
    ...parseKeywordList(config.inputs.keywords, 'KEYWORDS'),
    ...parseKeywordList(config.inputs.keywordsJson, 'KEYWORDS_JSON'),
  ];
}

function resolveSeed(): Seed | null {
  if (config.inputs.seedFile) {
    return loadSeedFile(config.inputs.seedFile);
  }
  return seedFromEnv(config.seed);
}

async function runCommand(name: CommandName, prompt: string, signal: AbortSignal): Promise<number> {
  const retriever = new ArchiveRetriever();
  const keywords = userKeywords();

  switch (name) {
    case 'collect': {
      const db = openDatabase(config.paths.database);
      try {
        const collector = new CorpusCollector({
          source: retriever,
          runLog: new RunLog(db),
          validator: new CommunityValidator(),
        });
        const result = await collector.run({
          prompt,
          keywords,
          exclude: parseKeywordList(config.inputs.excludeKeywordsJson, 'EXCLUDE_KEYWORDS_JSON'),
          communities: config.inputs.subs,
          seed: resolveSeed(),
          outputPath: config.paths.output,
          signal,
        });
        logger.info(`Archive requests: ${JSON.stringify(retriever.getStats())}`);
        return result.errors.length > 0 ? 1 : 0;
      } finally {
        db.close();
      }
    }

    case 'discover': {
      const discoverer = new SubredditDiscoverer(retriever);
      const communities = await discoverer.discover(
        prompt,
        joinKeywords(keywords),
        config.acquisition.months,
        config.acquisition.maxSubs,
        signal,
      );
      console.log(communities.join(' '));
      return 0;
    }

    case 'diagnose': {
      const diagnostics = new ArchiveDiagnostics(retriever);
      const report = await diagnostics.diagnose({
        prompt,
        keywords: joinKeywords(keywords),
        communities: config.inputs.subs,
        months: config.acquisition.months,
        maxSubs: config.acquisition.maxSubs,
      });
      writeDiagnostics(config.paths.diagnostics, report);
      logger.info(`Diagnostics written to ${config.paths.diagnostics}`);
      return report.status === 'healthy' ? 0 : 1;
    }
  }
}

// CLI entry point
const [commandName, ...promptParts] = process.argv.slice(2);
const prompt = promptParts.join(' ').trim();

if (!isCommand(commandName) || !prompt) {
  console.log('Usage: topic-corpus <command> <prompt>');
  console.log(`Commands: ${COMMANDS.join(', ')}`);
  process.exit(1);
}

const controller = new AbortController();
for (const signalName of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signalName, () => {
    logger.warn(`Received ${signalName}, stopping after the current page...`);
    controller.abort();
  });
}

runCommand(commandName, prompt, controller.signal)
  .then((code) => {
    logger.info(`${commandName} finished`);
    process.exit(code);
  })
  .catch((error) => {
    logger.error(`${commandName} failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
