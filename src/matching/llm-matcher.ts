/**
 * LLM-backed matcher for targets in another language.
 *
 * Paragraph choice: the model is first asked for the index of the matching
 * paragraph. When that answer is unusable, each of the first ten non-empty
 * candidates is scored 0-10 and the best one is kept if it scores above 5.
 *
 * Insertions are translated, then placed at a character position the model
 * picks (end of paragraph when its answer is unusable). Deletions ask the
 * model for the exact target text to remove.
 */

import { MatcherError, errorMessage } from '../core/errors';
import { silentLogger, type Logger } from '../core/logger';
import { RevisionKind, type RevisionRecord } from '../types';
import type { MatchOptions, RevisionMatch, SemanticMatcher } from './types';
import type { OllamaClient } from './ollama-client';
import {
  wrapPrompt,
  alignmentPrompt,
  similarityPrompt,
  translationPrompt,
  insertionPositionPrompt,
  deletionTargetPrompt,
  cleanResponse,
  type LanguagePair,
} from './prompts';

const MAX_SCORED_CANDIDATES = 10;
const ACCEPT_SIMILARITY_ABOVE = 5;

export interface LlmMatcherOptions {
  /** Language of the target document (default: Chinese) */
  targetLanguage?: string;
  /** Language of the source document (default: English) */
  sourceLanguage?: string;
  logger?: Logger;
}

interface ParagraphChoice {
  index: number;
  /** 0..1, only set when the choice came from similarity scoring */
  score?: number;
}

export class LlmMatcher implements SemanticMatcher {
  readonly name = 'llm';
  private readonly languages: LanguagePair;
  private readonly logger: Logger;
  private availability: Promise<boolean> | null = null;

  constructor(
    private readonly client: OllamaClient,
    options: LlmMatcherOptions = {}
  ) {
    this.languages = {
      source: options.sourceLanguage ?? 'English',
      target: options.targetLanguage ?? 'Chinese',
    };
    this.logger = options.logger ?? silentLogger;
  }

  async match(
    record: RevisionRecord,
    candidates: readonly string[],
    options: MatchOptions = {}
  ): Promise<RevisionMatch | null> {
    await this.ensureAvailable();

    const choice = await this.chooseParagraph(record, candidates, options.signal);
    if (choice === null) {
      return null;
    }
    const targetText = candidates[choice.index];

    if (record.kind === RevisionKind.Insertion) {
      const text = await this.ask(translationPrompt(record.text, this.languages), options.signal);
      const offset = await this.choosePosition(targetText, text, options.signal);
      return {
        kind: RevisionKind.Insertion,
        paragraphIndex: choice.index,
        text,
        offset,
        score: choice.score,
      };
    }

    const substring = (
      await this.ask(deletionTargetPrompt(targetText, record.text, this.languages), options.signal)
    ).trim();
    return {
      kind: RevisionKind.Deletion,
      paragraphIndex: choice.index,
      substring,
      score: choice.score,
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async ensureAvailable(): Promise<void> {
    if (this.availability === null) {
      this.availability = this.client.isAvailable();
    }
    if (!(await this.availability)) {
      throw new MatcherError(
        'UNAVAILABLE',
        `Ollama server not available or model ${this.client.config.model} not loaded`
      );
    }
  }

  private async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    return cleanResponse(await this.client.generate(wrapPrompt(prompt), { signal }));
  }

  private async chooseParagraph(
    record: RevisionRecord,
    candidates: readonly string[],
    signal?: AbortSignal
  ): Promise<ParagraphChoice | null> {
    const listed = candidates
      .map((text, index) => ({ index, text }))
      .filter(({ text }) => text.trim() !== '');
    if (listed.length === 0) {
      return null;
    }

    const answer = await this.ask(alignmentPrompt(record.originalContext, listed, this.languages), signal);
    const indexMatch = answer.match(/\d+/);
    if (indexMatch) {
      const index = parseInt(indexMatch[0], 10);
      if (listed.some((candidate) => candidate.index === index)) {
        return { index };
      }
    }
    this.logger.debug(`Alignment answer "${answer}" is not a listed paragraph; scoring candidates`);

    let best: ParagraphChoice | null = null;
    let bestScore = -1;
    for (const { index, text } of listed.slice(0, MAX_SCORED_CANDIDATES)) {
      const score = await this.scoreSimilarity(record.originalContext, text, signal);
      if (score > bestScore) {
        bestScore = score;
        best = { index, score: score / 10 };
      }
    }

    return bestScore > ACCEPT_SIMILARITY_ABOVE ? best : null;
  }

  private async scoreSimilarity(source: string, candidate: string, signal?: AbortSignal): Promise<number> {
    let answer: string;
    try {
      answer = await this.ask(similarityPrompt(source, candidate, this.languages), signal);
    } catch (error) {
      if (!(error instanceof MatcherError) || error.code !== 'BAD_RESPONSE') {
        throw error;
      }
      this.logger.warn(`Similarity query failed (${errorMessage(error)}); scoring 0`);
      return 0;
    }
    const numberMatch = answer.match(/\d+(?:\.\d+)?/);
    if (!numberMatch) {
      this.logger.debug(`Unparsable similarity answer: "${answer}"`);
      return 0;
    }
    return Math.max(0, Math.min(10, parseFloat(numberMatch[0])));
  }

  private async choosePosition(targetText: string, insertText: string, signal?: AbortSignal): Promise<number> {
    try {
      const answer = await this.ask(insertionPositionPrompt(targetText, insertText, this.languages), signal);
      const positionMatch = answer.match(/\d+/);
      if (positionMatch) {
        return Math.max(0, Math.min(parseInt(positionMatch[0], 10), targetText.length));
      }
      this.logger.debug(`Unparsable position answer "${answer}"; inserting at end`);
    } catch (error) {
      if (!(error instanceof MatcherError) || error.code !== 'BAD_RESPONSE') {
        throw error;
      }
      this.logger.warn(`Position query failed (${errorMessage(error)}); inserting at end`);
    }
    return targetText.length;
  }
}
