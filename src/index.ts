import 'dotenv/config';
import { initDB } from './db/client.js';
import { ingestFile } from './ingest/pipeline.js';
import { importChunksFile } from './ingest/import.js';
import { embedPendingChunks } from './ingest/embed.js';
import { buildEmbedSummary, buildImportSummary, buildIngestionSummary } from './ingest/summary.js';
import { formatSearchResults, searchKnowledge } from './retrieval/search.js';
import { createEmbeddingService } from './retrieval/embeddings.js';
import { createRelevanceScorer } from './retrieval/relevance.js';
import { createCrossEncoder } from './retrieval/cross-encoder.js';
import { healthStatus } from './observability.js';
import { getSettings, updateSettings } from './db/settings.js';
import { isRerankStrategy, lexicalFactorFromEnv, rerankerConfigFromEnv } from './config.js';

const BOOLEAN_FLAGS = new Set(['force', 'plain-headings']);

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const name = arg.slice(2);
    if (arg.startsWith('--') && BOOLEAN_FLAGS.has(name)) {
      flags[name] = 'true';
      i++;
    } else if (arg.startsWith('--') && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      flags[name] = args[i + 1];
      i += 2;
    } else {
      positional.push(arg);
      i++;
    }
  }
  return { positional, flags };
}

function numberFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${name} must be a number, got "${raw}"`);
  return n;
}

function positiveIntValue(key: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`${key} must be a positive integer, got "${value}"`);
  return n;
}

async function main() {
  const ctx = initDB(process.env.RAG_DB_PATH || undefined);

  const rawArgs = process.argv.slice(2);
  const cmd = rawArgs[0];
  const rest = rawArgs.slice(1);

  if (cmd === 'ingest') {
    const { positional, flags } = parseFlags(rest);
    const file = positional[0];
    if (!file) {
      console.error('Error: file required.\nUsage: npm run dev -- ingest <file.md> [--source <name>] [--target-tokens <n>] [--overlap <fraction>] [--force]');
      process.exit(1);
    }
    const result = await ingestFile(ctx, file, {
      sourceDocument: flags.source,
      targetTokens: numberFlag(flags, 'target-tokens'),
      overlapFraction: numberFlag(flags, 'overlap'),
      plainTextHeadings: flags['plain-headings'] === 'true',
      force: flags.force === 'true'
    });
    console.log(buildIngestionSummary(result));
    return;
  }

  if (cmd === 'import') {
    const file = rest[0];
    if (!file) {
      console.error('Error: file required.\nUsage: npm run dev -- import <chunks.json>');
      process.exit(1);
    }
    console.log(buildImportSummary(await importChunksFile(ctx, file)));
    return;
  }

  if (cmd === 'embed') {
    const { flags } = parseFlags(rest);
    const result = await embedPendingChunks(ctx, createEmbeddingService(), { sourceDocument: flags.source });
    console.log(buildEmbedSummary(result));
    return;
  }

  if (cmd === 'search') {
    const { positional, flags } = parseFlags(rest);
    const query = positional.join(' ');
    if (!query.trim()) {
      console.error('Error: query required.\nUsage: npm run dev -- search "<query>" [--k <n>] [--top <n>] [--strategy multi_signal|cross_encoder]');
      process.exit(1);
    }
    if (flags.strategy && !isRerankStrategy(flags.strategy)) {
      console.error(`Error: invalid strategy "${flags.strategy}". Valid: multi_signal, cross_encoder`);
      process.exit(1);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const result = await searchKnowledge(
      {
        ctx,
        embedder: createEmbeddingService(),
        scorer: createRelevanceScorer(),
        crossEncoder: createCrossEncoder(),
        rerankerConfig: rerankerConfigFromEnv(),
        lexicalFactor: lexicalFactorFromEnv()
      },
      query,
      {
        k: numberFlag(flags, 'k'),
        topK: numberFlag(flags, 'top'),
        strategy: flags.strategy && isRerankStrategy(flags.strategy) ? flags.strategy : undefined,
        signal: controller.signal
      }
    );
    console.log(formatSearchResults(result));
    return;
  }

  if (cmd === 'status') {
    console.log(JSON.stringify({ health: healthStatus(ctx), settings: getSettings(ctx) }, null, 2));
    return;
  }

  if (cmd === 'config' && rest[0] === 'set' && rest[1] && rest[2] !== undefined) {
    const key = rest[1];
    const value = rest.slice(2).join(' ');
    if (key === 'rerankStrategy') {
      if (!isRerankStrategy(value)) throw new Error(`rerankStrategy must be multi_signal or cross_encoder, got "${value}"`);
      updateSettings(ctx, { rerankStrategy: value });
    } else if (key === 'retrievalTopK') {
      updateSettings(ctx, { retrievalTopK: positiveIntValue(key, value) });
    } else if (key === 'rerankTopK') {
      updateSettings(ctx, { rerankTopK: positiveIntValue(key, value) });
    } else {
      throw new Error(`Unknown config key: ${key}`);
    }
    console.log(JSON.stringify(getSettings(ctx), null, 2));
    return;
  }

  console.log('Usage:');
  console.log('  npm run dev -- ingest <file.md> [--source <name>] [--target-tokens <n>] [--overlap <fraction>] [--plain-headings] [--force]');
  console.log('  npm run dev -- import <chunks.json>');
  console.log('  npm run dev -- embed [--source <name>]');
  console.log('  npm run dev -- search "<query>" [--k <n>] [--top <n>] [--strategy multi_signal|cross_encoder]');
  console.log('  npm run dev -- status');
  console.log('  npm run dev -- config set <rerankStrategy|retrievalTopK|rerankTopK> <value>');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
