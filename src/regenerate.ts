/**
 * Rebuild summary.txt for every archived channel from its stored
 * messages.json, without talking to Mattermost.
 *
 * Usage:
 *   npm run regenerate [-- --data <dir>]
 */

import 'dotenv/config';
import path from 'path';
import { loadConfig } from './config';
import { LLMFactory } from './llm/llmFactory';
import { TranscriptArchive } from './storage/transcriptArchive';
import { SummaryOrchestrator } from './summarizer/orchestrator';
import { loadPrompts } from './summarizer/prompts';
import { regenerateStoredSummaries } from './summarizer/regenerate';

async function main(): Promise<void> {
  const config = loadConfig();
  const flag = process.argv.indexOf('--data');
  const dataDir = flag !== -1 && process.argv[flag + 1] ? path.resolve(process.argv[flag + 1]) : config.storage.dataDir;

  console.log(`🗂️ Summarising stored messages under ${dataDir}`);
  const llm = LLMFactory.create(config.llm);
  try {
    const orchestrator = new SummaryOrchestrator(llm, loadPrompts(), config.llm);
    const result = await regenerateStoredSummaries(new TranscriptArchive(dataDir), orchestrator);
    console.log(`✅ ${result.written} written, ${result.skipped} skipped, ${result.fallbacks} fallback(s)`);
  } finally {
    llm.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
