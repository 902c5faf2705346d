import { Injectable } from '@nestjs/common';
import stopWordList from './stop-words.json';

export interface ExtractOptions {
  /** Emit adjacent surviving word pairs as extra terms. Defaults to true. */
  bigrams?: boolean;
}

const MIN_TOKEN_LENGTH = 2;
const APOSTROPHES = /['’]/g;
const NON_WORD = /[^\p{L}\p{N}\s]+/gu;
const WHITESPACE = /\s+/;

/**
 * Turns raw text into an ordered sequence of canonical terms.
 *
 * Canonical form: lower case, apostrophes dropped, any other character that is
 * not a letter, digit or whitespace replaced by a space, whitespace collapsed.
 * Unigrams survive unless they are stop words or shorter than two characters.
 * A bigram is emitted right after its first word when both words of an
 * adjacent pair survive.
 */
@Injectable()
export class TermExtractorService {
  private readonly stopWords: ReadonlySet<string> = new Set(stopWordList);

  extract(text: string, options: ExtractOptions = {}): string[] {
    const withBigrams = options.bigrams ?? true;
    const tokens = this.tokenize(text);
    const keep = tokens.map((token) => this.isCandidate(token));

    const terms: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      if (!keep[i]) continue;
      terms.push(tokens[i]);
      if (withBigrams && i + 1 < tokens.length && keep[i + 1]) {
        terms.push(`${tokens[i]} ${tokens[i + 1]}`);
      }
    }

    if (terms.length === 0 && tokens.length > 0) {
      return [this.longestToken(tokens)];
    }
    return terms;
  }

  /**
   * Canonical form of a single term, as used for graph node identity.
   */
  canonicalize(term: string): string {
    return this.tokenize(term).join(' ');
  }

  tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(APOSTROPHES, '')
      .replace(NON_WORD, ' ')
      .split(WHITESPACE)
      .filter((token) => token.length > 0);
  }

  private isCandidate(token: string): boolean {
    return token.length >= MIN_TOKEN_LENGTH && !this.stopWords.has(token);
  }

  private longestToken(tokens: string[]): string {
    return tokens.reduce((longest, token) =>
      token.length > longest.length ? token : longest,
    );
  }
}
