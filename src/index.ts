/**
 * docx-revision-projector - carries tracked changes from one Word document
 * onto a corresponding document that has none.
 *
 * @packageDocumentation
 */

export {
  RevisionKind,
  type RevisionRecord,
  type InsertionRecord,
  type DeletionRecord,
  type ParagraphContext,
  type ExtractionSummary,
  type ExtractionResult,
  type RecordFailureReason,
  type ApplyResult,
  type ApplySuccess,
  type ApplyFailure,
  type RecordState,
  type RecordOutcome,
  type ProgressReporter,
} from './types';

// Core module exports
export * from './core';

// Word document handling
export * from './wml/document';
export * from './wml/run-model';
export * from './wml/span-locator';
export * from './wml/run-splicer';
export * from './wml/revision';
export * from './wml/revision-extractor';
export * from './wml/revision-apply';
export * from './wml/revision-projector';

// Matchers
export * from './matching/types';
export { LexicalMatcher, bigramSimilarity, findInsertionOffset } from './matching/lexical-matcher';
export { LlmMatcher, type LlmMatcherOptions } from './matching/llm-matcher';
export { OllamaClient, type OllamaClientOptions, type GenerateOptions } from './matching/ollama-client';
export { cleanResponse } from './matching/prompts';

export * from './config';
