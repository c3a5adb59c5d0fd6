// src/services/assistant.ts
// What: Conversation orchestrator: one user question in, one answer string out.
// How: Runs each turn strictly in sequence, idle → embedding → retrieving → assembling → generating → idle.
//      Blank questions and a missing or empty index are answered locally without calling the embedder or the
//      model. Every failure past that point is logged with its stage and cause and turned into a fixed apology, so a
//      bad turn never reaches the caller as an exception.

import baseLogger, { type Logger } from '../logging.js';
import { errorMessage } from '../errors.js';
import type { Embedder } from './embeddings.js';
import type { Generator } from './generator.js';
import type { IndexLoadResult } from './indexLoader.js';
import { NOT_FOUND_ANSWER, assemblePrompt, defaultInstructions } from './prompt.js';
import { embedQuery, searchIndex, type RetrievedChunk } from './retriever.js';
import type { VectorIndex } from './vectorIndex.js';

export const EMPTY_QUERY_MESSAGE = 'Please type a question so I can help you.';
export const INDEX_NOT_READY_MESSAGE =
  'The knowledge base is not ready yet. Please build the index and try again.';
export const APOLOGY_MESSAGE = 'Sorry, something went wrong while answering your question. Please try again.';

export type TurnStage = 'idle' | 'loading' | 'embedding' | 'retrieving' | 'assembling' | 'generating';

export type ReplyStatus = 'answered' | 'empty_query' | 'index_not_ready' | 'no_content' | 'failed';

export interface AssistantReply {
  status: ReplyStatus;
  answer: string;
  sources: RetrievedChunk[];
  /** Stage at which the turn failed; only set when status is 'failed'. */
  failed_stage?: TurnStage;
}

export interface IndexSource {
  get(): Promise<IndexLoadResult>;
}

export interface CampusAssistantOptions {
  index: IndexSource;
  embedder: Embedder;
  generator: Generator;
  topK?: number; // default 3
  instructions?: string; // template with {context} and {question}
  logger?: Logger;
}

export class CampusAssistant {
  private readonly index: IndexSource;
  private readonly embedder: Embedder;
  private readonly generator: Generator;
  private readonly topK: number;
  private readonly instructions: string;
  private readonly logger: Logger;

  constructor(opts: CampusAssistantOptions) {
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.generator = opts.generator;
    this.topK = opts.topK ?? 3;
    this.instructions = opts.instructions ?? defaultInstructions('the college');
    this.logger = (opts.logger ?? baseLogger).child({ module: 'assistant' });
  }

  async answer(question: string): Promise<string> {
    const reply = await this.ask(question);
    return reply.answer;
  }

  async ask(question: string): Promise<AssistantReply> {
    if (isBlank(question)) {
      return { status: 'empty_query', answer: EMPTY_QUERY_MESSAGE, sources: [] };
    }

    let loaded: IndexLoadResult;
    try {
      loaded = await this.index.get();
    } catch (err: unknown) {
      return this.fail('loading', err);
    }
    if (loaded.status === 'not_found') {
      this.logger.warn({ path: loaded.path }, 'Question received but no index is available');
      return { status: 'index_not_ready', answer: INDEX_NOT_READY_MESSAGE, sources: [] };
    }

    return this.answerWithIndex(loaded.index, question);
  }

  /** Answers against a given index; the cache/loader is not consulted. */
  async answerWithIndex(index: VectorIndex, question: string): Promise<AssistantReply> {
    if (isBlank(question)) {
      return { status: 'empty_query', answer: EMPTY_QUERY_MESSAGE, sources: [] };
    }

    if (index.size === 0) {
      this.logger.warn('Index is empty; nothing to retrieve');
      return { status: 'no_content', answer: NOT_FOUND_ANSWER, sources: [] };
    }

    let stage: TurnStage = 'idle';
    const enter = (next: TurnStage) => {
      this.logger.debug({ from: stage, to: next }, 'Turn stage');
      stage = next;
    };

    try {
      enter('embedding');
      const vector = await embedQuery(this.embedder, index, question);

      enter('retrieving');
      const sources = searchIndex(index, vector, this.topK);

      enter('assembling');
      const prompt = assemblePrompt(
        sources.map((s) => s.content),
        question,
        this.instructions,
      );

      enter('generating');
      const answer = await this.generator.generate(prompt);

      enter('idle');
      this.logger.info({ sources: sources.length, top_score: sources[0]?.score }, 'Question answered');
      return { status: 'answered', answer, sources };
    } catch (err: unknown) {
      return this.fail(stage, err);
    }
  }

  private fail(stage: TurnStage, err: unknown): AssistantReply {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    this.logger.error({ err, stage, code, cause: errorMessage(err) }, 'Failed to answer question');
    return { status: 'failed', answer: APOLOGY_MESSAGE, sources: [], failed_stage: stage };
  }
}

function isBlank(question: string): boolean {
  return typeof question !== 'string' || question.trim().length === 0;
}
