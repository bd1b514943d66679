/**
 * Prompts for LLM-backed revision matching
 *
 * Every prompt asks for a bare answer (an index, a number or a piece of
 * text); responses go through cleanResponse before they are parsed.
 */

export interface LanguagePair {
  source: string;
  target: string;
}

/** Paragraph text shown in the alignment list is cut to this length */
const LIST_PREVIEW_LENGTH = 100;
/** Context shown to the similarity prompt */
const SIMILARITY_PREVIEW_LENGTH = 200;

export function wrapPrompt(prompt: string): string {
  return `You are a professional document processing assistant. Follow instructions precisely and respond only with the requested information.

${prompt}

Important: Respond only with the exact text requested, no additional commentary.`;
}

export function alignmentPrompt(
  sourceParagraph: string,
  candidates: ReadonlyArray<{ index: number; text: string }>,
  languages: LanguagePair
): string {
  const list = candidates
    .map(({ index, text }) =>
      text.length > LIST_PREVIEW_LENGTH
        ? `${index}: ${text.slice(0, LIST_PREVIEW_LENGTH)}...`
        : `${index}: ${text}`
    )
    .join('\n- ');

  return `Find the ${languages.target} paragraph that corresponds to this ${languages.source} paragraph.

${languages.source} paragraph: "${sourceParagraph}"

${languages.target} paragraphs:
${list}

Respond with only the number (index) of the matching ${languages.target} paragraph.`;
}

export function similarityPrompt(sourceParagraph: string, candidate: string, languages: LanguagePair): string {
  return `Rate the similarity between these two paragraphs on a scale of 0-10:

${languages.source}: "${sourceParagraph.slice(0, SIMILARITY_PREVIEW_LENGTH)}"
${languages.target}: "${candidate.slice(0, SIMILARITY_PREVIEW_LENGTH)}"

Respond with only a number from 0 to 10.`;
}

export function translationPrompt(text: string, languages: LanguagePair): string {
  return `Translate this ${languages.source} text to ${languages.target}:
${languages.source}: "${text}"

Respond with only the ${languages.target} translation.`;
}

export function insertionPositionPrompt(targetParagraph: string, textToInsert: string, languages: LanguagePair): string {
  return `Determine the best character position to insert this text:

Original ${languages.target} text: "${targetParagraph}"
Text to insert: "${textToInsert}"
Context: This corresponds to an insertion in the ${languages.source} version.

Respond with only a number representing the character position (0 to ${targetParagraph.length}).`;
}

export function deletionTargetPrompt(targetParagraph: string, deletedText: string, languages: LanguagePair): string {
  return `Identify the exact ${languages.target} text that should be deleted based on the ${languages.source} deletion:

${languages.target} paragraph: "${targetParagraph}"
${languages.source} text that was deleted: "${deletedText}"

Respond with only the exact ${languages.target} text that corresponds to the deleted ${languages.source} text.`;
}

/**
 * Strip reasoning blocks (`<think>...</think>`), surrounding whitespace and
 * one pair of wrapping double quotes.
 */
export function cleanResponse(response: string): string {
  let result = response.replace(/<think>[\s\S]*?<\/think>/g, '').trim();
  if (result.length >= 2 && result.startsWith('"') && result.endsWith('"')) {
    result = result.slice(1, -1);
  }
  return result;
}
