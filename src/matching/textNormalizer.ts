/**
 * Text Normalizer
 * Turns market questions and contract names into comparable token sets
 */

import lexicon from './lexicon.json';

export interface TextNormalizerOptions {
  stopWords: Iterable<string>;
  domainTerms: Iterable<string>;
}

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const APOSTROPHES = /['\u2019]/g;

export class TextNormalizer {
  private readonly stopWords: Set<string>;
  private readonly domainTerms: Set<string>;

  constructor(options?: Partial<TextNormalizerOptions>) {
    this.stopWords = new Set(options?.stopWords ?? lexicon.stopWords);
    this.domainTerms = new Set(options?.domainTerms ?? lexicon.domainTerms);
  }

  /**
   * Cleaned, lower-cased form of the text with single spaces between words
   */
  normalizeText(text: string): string {
    return stripMarks(text)
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Token set used for similarity scoring
   */
  normalize(text: string): Set<string> {
    const tokens = new Set<string>();
    const cleaned = this.normalizeText(text);
    if (!cleaned) {
      return tokens;
    }

    for (const word of cleaned.split(' ')) {
      if (this.stopWords.has(word)) continue;
      tokens.add(foldPlural(word));
    }

    return tokens;
  }

  /**
   * Extract salient terms in source order: capitalized names, numbers
   * and words from the domain dictionary
   */
  extractKeyTerms(text: string): string[] {
    const terms: string[] = [];
    const words = stripMarks(text).split(/[^\p{L}\p{N}]+/u);

    for (const word of words) {
      if (!word) continue;
      const lower = word.toLowerCase();
      if (this.stopWords.has(lower)) continue;

      const isName = /^\p{Lu}/u.test(word);
      const isNumber = /^\p{N}/u.test(word);
      if ((isName || isNumber || this.domainTerms.has(lower)) && !terms.includes(lower)) {
        terms.push(lower);
      }
    }

    return terms;
  }

  isStopWord(word: string): boolean {
    return this.stopWords.has(word.toLowerCase());
  }
}

function stripMarks(text: string): string {
  return text.normalize('NFD').replace(COMBINING_MARKS, '').replace(APOSTROPHES, '');
}

// "republicans" -> "republican"; leaves "congress", "status", "crisis" alone
function foldPlural(token: string): string {
  if (token.length > 3 && token.endsWith('s') && !/(ss|us|is)$/.test(token)) {
    return token.slice(0, -1);
  }
  return token;
}

export const textNormalizer = new TextNormalizer();
