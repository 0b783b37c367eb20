import type { EmbedResult } from './embed.js';
import type { ImportResult } from './import.js';
import type { IngestResult } from './pipeline.js';

export function buildIngestionSummary(result: IngestResult): string {
  if (result.skipped) {
    return [
      `Skipped "${result.sourceDocument}" (job #${result.jobId})`,
      `Already stored: ${result.chunks} chunks. Re-run with --force to replace them.`
    ].join('\n');
  }
  return [
    `✅ Ingested "${result.sourceDocument}" (job #${result.jobId})`,
    `Chunks: ${result.chunks}`,
    result.replaced > 0 ? `Replaced: ${result.replaced} previous chunks` : null
  ]
    .filter(Boolean)
    .join('\n');
}

export function buildImportSummary(result: ImportResult): string {
  return `✅ Imported ${result.image} image and ${result.table} table chunks (job #${result.jobId})`;
}

export function buildEmbedSummary(result: EmbedResult): string {
  const lines = [`✅ Embedded ${result.embedded} chunks (job #${result.jobId})`, `Already embedded: ${result.skipped}`];
  if (result.failed > 0) lines.push(`Failed: ${result.failed} (left for the next run)`);
  return lines.join('\n');
}
