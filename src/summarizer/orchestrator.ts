import { LLMConfig } from '../config';
import { EmptySummaryError } from '../errors';
import { CompletionRequest, LLMProvider } from '../llm/types';
import { BatchLimits, groupIntoBatches } from '../batching/batchGrouper';
import { formatTimestamp, renderTemplate } from '../batching/formatting';
import {
  Tokenizer,
  approximateTokens,
  buildSegments,
  promptOverhead,
  segmentTokenBudget,
  truncateLine,
} from '../batching/segmenter';
import { SummaryContext, SummaryGroup, SummaryOutcome } from '../types';
import { parseBatchResponse, renderBatchPrompt } from './batchResponse';
import { PromptTemplates } from './prompts';
import { RateLimiter } from './rateLimiter';
import { Clock, RetryPolicy, Sleep, sleep, withRetry } from './retry';

const MAX_REDUCE_ROUNDS = 3;

export type OrchestratorOptions = Pick<
  LLMConfig,
  | 'contextWindowTokens'
  | 'maxOutputTokens'
  | 'maxRetries'
  | 'rateLimitBackoffMs'
  | 'interRequestDelayMs'
  | 'batchSize'
  | 'maxBatchCharacters'
  | 'maxBatches'
>;

export interface OrchestratorHooks {
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Deterministic text for a channel the model could not summarise.
 */
export function fallbackSummary(group: Pick<SummaryGroup, 'messageCount' | 'context' | 'startAt' | 'endAt'>): string {
  const start = formatTimestamp(group.startAt);
  const window =
    group.startAt !== undefined && group.endAt !== undefined && group.startAt !== group.endAt
      ? `${start} – ${formatTimestamp(group.endAt)}`
      : start;
  const plural = group.messageCount === 1 ? '' : 's';
  return `${group.messageCount} message${plural} captured for ${group.context.groupName} (${window}). Unable to generate an AI summary at this time.`;
}

/**
 * Drives the LLM provider: per-channel segmentation, multi-channel batching,
 * retries, and the fallback text when everything else fails.
 */
export class SummaryOrchestrator {
  private tokenizer: Tokenizer;
  private limiter: RateLimiter;
  private policy: RetryPolicy;
  private sleep: Sleep;
  private now: Clock;

  constructor(
    private llm: LLMProvider,
    private prompts: PromptTemplates,
    private options: OrchestratorOptions,
    hooks: OrchestratorHooks = {}
  ) {
    this.tokenizer = llm.countTokens?.bind(llm) ?? approximateTokens;
    this.sleep = hooks.sleep ?? sleep;
    this.now = hooks.now ?? Date.now;
    this.limiter = new RateLimiter(options.interRequestDelayMs, this.sleep, this.now);
    this.policy = {
      maxRetries: options.maxRetries,
      rateLimitBackoffMs: options.rateLimitBackoffMs,
    };
  }

  private get batchLimits(): BatchLimits {
    return {
      batchSize: this.options.batchSize,
      maxBatchCharacters: this.options.maxBatchCharacters,
      maxBatches: this.options.maxBatches,
    };
  }

  private get segmentBudget() {
    const { system, user, segmentNotes } = this.prompts;
    return {
      contextWindowTokens: this.options.contextWindowTokens,
      maxOutputTokens: this.options.maxOutputTokens,
      promptOverheadTokens: Math.max(
        promptOverhead(`${system}\n${user}`, this.tokenizer),
        promptOverhead(`${system}\n${segmentNotes}`, this.tokenizer)
      ),
      tokenizer: this.tokenizer,
    };
  }

  /** Token-bounded slices of a conversation. */
  segment(lines: string[]): string[] {
    return buildSegments(lines, this.segmentBudget);
  }

  private call(request: CompletionRequest, label: string): Promise<string> {
    return withRetry(
      () => this.limiter.schedule(() => this.llm.complete(request)),
      this.policy,
      { sleep: this.sleep, now: this.now, label }
    );
  }

  private contextValues(context: SummaryContext, conversation: string): Record<string, string> {
    return {
      GROUP_NAME: context.groupName,
      START_DATE: context.startDate,
      END_DATE: context.endDate,
      CONVERSATION: conversation,
    };
  }

  /**
   * One request for one conversation. Throws on failure or empty output.
   */
  async summarise(groupId: string, context: SummaryContext, lines: string[]): Promise<string> {
    const user = renderTemplate(this.prompts.user, this.contextValues(context, lines.join('\n')));
    const text = (await this.call({ system: this.prompts.system, user }, `Summary for ${context.groupName}`)).trim();
    if (!text) throw new EmptySummaryError(groupId);
    return text;
  }

  /**
   * Map-reduce over a conversation that does not fit one request: notes per
   * segment, then the final template over the concatenated notes.
   */
  async summariseSegmented(groupId: string, context: SummaryContext, segments: string[]): Promise<string> {
    let current = segments;

    for (let round = 1; round <= MAX_REDUCE_ROUNDS; round++) {
      const notes: string[] = [];
      for (let i = 0; i < current.length; i++) {
        const user = renderTemplate(this.prompts.segmentNotes, {
          ...this.contextValues(context, current[i]),
          SEGMENT_INDEX: String(i + 1),
          SEGMENT_COUNT: String(current.length),
        });
        const note = (
          await this.call(
            { system: this.prompts.system, user },
            `Segment ${i + 1}/${current.length} for ${context.groupName}`
          )
        ).trim();
        if (!note) throw new EmptySummaryError(groupId);
        notes.push(note);
      }

      const next = this.segment(notes);
      if (next.length === 1) {
        return this.summarise(groupId, context, next);
      }
      if (next.length < current.length && round < MAX_REDUCE_ROUNDS) {
        current = next;
        continue;
      }

      console.warn(`✂️ Notes for ${context.groupName} still exceed one request; truncating`);
      const limit = segmentTokenBudget(this.segmentBudget);
      return this.summarise(groupId, context, [truncateLine(notes.join('\n'), limit, this.tokenizer)]);
    }

    throw new EmptySummaryError(groupId);
  }

  /**
   * Several conversations in one request. Ids the reply leaves out are
   * absent from the returned map.
   */
  async summariseBatch(groups: SummaryGroup[]): Promise<Map<string, string>> {
    const names = groups.map(group => group.context.groupName).join(', ');
    const response = await this.call(
      { system: this.prompts.batchSystem, user: renderBatchPrompt(groups) },
      `Batch for ${names}`
    );
    return parseBatchResponse(response, groups.map(group => group.groupId));
  }

  /** Whether the rendered batch request leaves room for the reply. */
  private batchFits(groups: SummaryGroup[]): boolean {
    const prompt = `${this.prompts.batchSystem}\n${renderBatchPrompt(groups)}`;
    return this.tokenizer(prompt) <= this.options.contextWindowTokens - this.options.maxOutputTokens;
  }

  private async summariseOrNull(group: SummaryGroup): Promise<string | null> {
    try {
      return await this.summarise(group.groupId, group.context, group.lines);
    } catch (error) {
      console.error(`❌ Failed to generate summary for ${group.context.groupName} via single request:`, error);
      return null;
    }
  }

  /**
   * A summary for every group, whatever the backend does. Groups that fit a
   * single request are batched; larger ones go through map-reduce.
   */
  async summariseMany(groups: SummaryGroup[]): Promise<Map<string, SummaryOutcome>> {
    const outcomes = new Map<string, SummaryOutcome>();
    const singles: SummaryGroup[] = [];
    const retry: SummaryGroup[] = [];

    for (const group of groups) {
      if (group.lines.length === 0) continue;
      let segments: string[];
      try {
        segments = this.segment(group.lines);
      } catch (error) {
        console.error(`❌ Cannot segment ${group.context.groupName}:`, error);
        continue;
      }
      if (segments.length <= 1) {
        singles.push({ ...group, lines: segments });
        continue;
      }
      console.log(`🧩 ${group.context.groupName} spans ${segments.length} segments`);
      try {
        const summary = await this.summariseSegmented(group.groupId, group.context, segments);
        outcomes.set(group.groupId, { summary, source: 'segmented' });
      } catch (error) {
        console.error(`❌ Segmented summary failed for ${group.context.groupName}:`, error);
      }
    }

    const batches = groupIntoBatches(
      singles,
      group => group.lines.join('\n').length,
      this.batchLimits,
      candidate => this.batchFits(candidate)
    );
    for (const batch of batches) {
      if (batch.length === 1) {
        retry.push(batch[0]);
        continue;
      }

      console.log(`📦 Submitting batch with ${batch.length} group(s): ${batch.map(g => g.context.groupName).join(', ')}`);
      try {
        const partial = await this.summariseBatch(batch);
        for (const group of batch) {
          const summary = partial.get(group.groupId);
          if (summary) outcomes.set(group.groupId, { summary, source: 'batch' });
          else retry.push(group);
        }
        const missing = batch.length - partial.size;
        if (missing > 0) {
          console.warn(`⚠️ Batch response omitted ${missing} group(s); retrying individually`);
        }
      } catch (error) {
        console.error(`❌ Batch summarisation failed for ${batch.length} group(s); retrying individually:`, error);
        retry.push(...batch);
      }
    }

    for (const group of retry) {
      const summary = await this.summariseOrNull(group);
      if (summary) outcomes.set(group.groupId, { summary, source: 'single' });
    }

    const ordered = new Map<string, SummaryOutcome>();
    for (const group of groups) {
      ordered.set(
        group.groupId,
        outcomes.get(group.groupId) ?? { summary: fallbackSummary(group), source: 'fallback' }
      );
    }
    return ordered;
  }
}
