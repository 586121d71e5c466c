import 'dotenv/config';
import { AppConfig, loadConfig } from './config';
import { MattermostClient } from './chat/mattermostClient';
import { LLMFactory } from './llm/llmFactory';
import { DigestService } from './poller/digestService';
import { PollingLoop } from './poller/pollingLoop';
import { SummaryQueue } from './poller/summaryQueue';
import { presentSummaries } from './presenter/consolePresenter';
import { TranscriptArchive } from './storage/transcriptArchive';
import { WatermarkStore } from './storage/watermarkStore';
import { SummaryOrchestrator } from './summarizer/orchestrator';
import { loadPrompts } from './summarizer/prompts';
import { ChannelSummary } from './types';

function createService(config: AppConfig, queue: SummaryQueue<ChannelSummary>): DigestService {
  const chat = new MattermostClient(config.mattermost);
  const llm = LLMFactory.create(config.llm);
  const orchestrator = new SummaryOrchestrator(llm, loadPrompts(), config.llm);

  return new DigestService({
    chat,
    llm,
    orchestrator,
    archive: new TranscriptArchive(config.storage.dataDir),
    watermarks: new WatermarkStore(config.storage.dataDir),
    queue,
    initialFetchLimit: config.mattermost.initialFetchLimit,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const queue = new SummaryQueue<ChannelSummary>();
  const service = createService(config, queue);

  for (const summary of service.loadExistingSummaries()) {
    queue.push(summary);
  }

  const loop = new PollingLoop(service, config.mattermost.pollIntervalMs);
  loop.start();

  // The presentation side only ever reads from the queue
  const presenter = setInterval(() => presentSummaries(queue.drain()), config.ui.refreshIntervalMs);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`👋 Received ${signal}, shutting down...`);
    clearInterval(presenter);
    await loop.stop();
    presentSummaries(queue.drain());
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  console.log('⚡️ Mattermost digest is running!');
  console.log(`🌐 Server: ${config.mattermost.baseUrl}`);
  console.log(`💾 Data directory: ${config.storage.dataDir}`);
}

main().catch(error => {
  console.error('Startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
