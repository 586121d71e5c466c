import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LLMRequestError } from '../src/errors';
import { DigestService, toChannelSummary } from '../src/poller/digestService';
import { SummaryQueue } from '../src/poller/summaryQueue';
import { TranscriptArchive } from '../src/storage/transcriptArchive';
import { WatermarkStore } from '../src/storage/watermarkStore';
import { OrchestratorOptions, SummaryOrchestrator } from '../src/summarizer/orchestrator';
import { Channel, ChannelSummary } from '../src/types';
import { FakeChatPlatform, FakeLLM, TEST_PROMPTS, noSleep, tempDir } from './helpers/fakes';

const OPTIONS: OrchestratorOptions = {
  contextWindowTokens: 2048,
  maxOutputTokens: 512,
  maxRetries: 0,
  rateLimitBackoffMs: 0,
  interRequestDelayMs: 0,
  batchSize: 3,
  maxBatchCharacters: 60000,
  maxBatches: 0,
};

function setup(llm: FakeLLM) {
  const root = tempDir();
  const chat = new FakeChatPlatform();
  const archive = new TranscriptArchive(root);
  const watermarks = new WatermarkStore(root);
  const queue = new SummaryQueue<ChannelSummary>();
  const service = new DigestService({
    chat,
    llm,
    orchestrator: new SummaryOrchestrator(llm, TEST_PROMPTS, OPTIONS, { sleep: noSleep }),
    archive,
    watermarks,
    queue,
  });

  chat.users = { u1: 'Alice' };
  chat.addChannel(
    { id: 'c1', name: 'design', display_name: 'Design', type: 'D', last_post_at: 2000 },
    { last_viewed_at: 1000 },
    [
      { create_at: 900, user_id: 'u1', message: 'already read' },
      { create_at: 1500, user_id: 'u1', message: 'hello' },
      { create_at: 2000, user_id: 'u2', message: 'bye' },
    ]
  );

  return { chat, archive, watermarks, queue, service };
}

describe('DigestService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('summarises new posts, stores them and advances the watermark', async () => {
    const llm = new FakeLLM(() => 'summary text');
    const { archive, watermarks, queue, service } = setup(llm);

    const stats = await service.runCycle();

    expect(stats).toEqual({ channels: 1, published: 1, fallbacks: 0, failed: 0 });
    expect(llm.requests[0].user).toBe(
      'USER Design\n#1 [1970-01-01 00:00] Alice: hello\n#2 [1970-01-01 00:00] u2: bye'
    );
    expect(watermarks.get('c1')).toBe(2000);
    expect(archive.loadSummary('c1')).toBe('summary text');
    expect(archive.loadMessages('c1').map(post => post.create_at)).toEqual([1500, 2000]);
    expect(archive.loadDescriptor('c1')).toEqual({
      teamId: 'team-1',
      channelId: 'c1',
      channelName: 'design',
      displayName: 'Design',
    });
    expect(queue.drain()).toEqual([
      {
        teamId: 'team-1',
        channelId: 'c1',
        channelName: 'design',
        displayName: 'Design',
        unreadCount: 2,
        summary: 'summary text',
      },
    ]);
  });

  it('finds nothing new on an immediate rerun', async () => {
    const llm = new FakeLLM(() => 'summary text');
    const { queue, service } = setup(llm);

    await service.runCycle();
    queue.drain();
    const stats = await service.runCycle();

    expect(stats.channels).toBe(0);
    expect(llm.requests).toHaveLength(1);
    expect(queue.size).toBe(0);
  });

  it('publishes the fallback text when the model is unavailable', async () => {
    const llm = new FakeLLM(() => {
      throw new LLMRequestError('bad request', { status: 400 });
    });
    const { archive, watermarks, queue, service } = setup(llm);

    const stats = await service.runCycle();

    const expected =
      '2 messages captured for Design (1970-01-01 00:00 UTC – 1970-01-01 00:00 UTC). Unable to generate an AI summary at this time.';
    expect(stats).toEqual({ channels: 1, published: 1, fallbacks: 1, failed: 0 });
    expect(archive.loadSummary('c1')).toBe(expected);
    expect(watermarks.get('c1')).toBe(2000);
    expect(queue.drain()[0].summary).toBe(expected);
  });

  it('reloads stored summaries for the first render', async () => {
    const llm = new FakeLLM(() => 'summary text');
    const { service } = setup(llm);
    await service.runCycle();

    expect(service.loadExistingSummaries()).toEqual([
      {
        teamId: 'team-1',
        channelId: 'c1',
        channelName: 'design',
        displayName: 'Design',
        unreadCount: 0,
        summary: 'summary text',
      },
    ]);
  });

  it('publishes a channel listed under two teams once', async () => {
    const llm = new FakeLLM(() => 'summary text');
    const { chat, queue, service } = setup(llm);
    chat.teams.push({ id: 'team-2' });
    chat.channels['team-2'] = [...chat.channels['team-1']];
    chat.members['team-2'] = [...chat.members['team-1']];

    const stats = await service.runCycle();

    expect(stats.channels).toBe(1);
    expect(llm.requests).toHaveLength(1);
    expect(queue.drain().map(summary => [summary.teamId, summary.channelId])).toEqual([['team-1', 'c1']]);
  });

  it('re-summarises the same posts after a cycle that stored them but kept the watermark', async () => {
    const llm = new FakeLLM(() => 'summary text');
    const { archive, watermarks, queue, service } = setup(llm);
    vi.spyOn(archive, 'saveSummary').mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    const first = await service.runCycle();

    expect(first).toEqual({ channels: 1, published: 0, fallbacks: 0, failed: 1 });
    expect(archive.loadMessages('c1').map(post => post.create_at)).toEqual([1500, 2000]);
    expect(watermarks.get('c1')).toBeUndefined();
    expect(queue.size).toBe(0);

    const second = await service.runCycle();

    expect(second).toEqual({ channels: 1, published: 1, fallbacks: 0, failed: 0 });
    expect(llm.requests).toHaveLength(2);
    expect(llm.requests[1].user).toBe(llm.requests[0].user);
    expect(watermarks.get('c1')).toBe(2000);
    expect(queue.drain()).toHaveLength(1);

    expect((await service.runCycle()).channels).toBe(0);
    expect(queue.size).toBe(0);
  });

  it('keeps publishing other channels when one fails to persist', async () => {
    const llm = new FakeLLM(() => '{"c1": ["one"], "c2": ["two"]}');
    const { chat, archive, watermarks, queue, service } = setup(llm);
    chat.addChannel({ id: 'c2', name: 'ops', display_name: 'Ops', type: 'D', last_post_at: 3000 }, { last_viewed_at: 1000 }, [
      { create_at: 3000, user_id: 'u1', message: 'later' },
    ]);
    const save = archive.saveSummary.bind(archive);
    vi.spyOn(archive, 'saveSummary').mockImplementation((key, summary) => {
      if (key === 'c1') throw new Error('disk full');
      return save(key, summary);
    });

    const stats = await service.runCycle();

    expect(stats).toEqual({ channels: 2, published: 1, fallbacks: 0, failed: 1 });
    expect(queue.drain().map(summary => [summary.channelId, summary.summary])).toEqual([['c2', '- two']]);
    expect(watermarks.get('c2')).toBe(3000);
    expect(watermarks.get('c1')).toBeUndefined();
  });

  it('closes the chat client and the model provider', () => {
    const llm = new FakeLLM();
    const { chat, service } = setup(llm);
    service.close();
    expect(chat.closed).toBe(true);
    expect(llm.closed).toBe(true);
  });
});

describe('toChannelSummary', () => {
  const channel: Channel = {
    teamId: 't',
    id: 'c',
    name: 'n',
    displayName: 'N',
    kind: 'direct',
    mentionCount: 0,
    unreadCount: 7,
    lastViewedAt: 0,
    lastPostAt: 0,
    highlighted: false,
  };

  it('prefers the server unread count over the post count', () => {
    expect(toChannelSummary(channel, 3, 's').unreadCount).toBe(7);
    expect(toChannelSummary({ ...channel, unreadCount: 0 }, 3, 's').unreadCount).toBe(3);
  });
});
