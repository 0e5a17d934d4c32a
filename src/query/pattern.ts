import { MalformedInputError } from '../errors.js';
import type { FilterDocument } from './types.js';

export interface PatternFlags {
  caseSensitive?: boolean;
  startsWith?: boolean;
  endsWith?: boolean;
  wholeString?: boolean;
  /** Translate SQL LIKE wildcards: `%` any sequence, `_` any single character. */
  likeWildcards?: boolean;
  /** With likeWildcards: the character after it is matched literally. */
  escape?: string;
}

const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegex(text: string): string {
  return text.replace(REGEX_METACHARACTERS, '\\$&');
}

interface TranslatedPattern {
  /** Regex source, not yet anchored. */
  expr: string;
  /** The text with escapes removed, for when no regex is needed. */
  literal: string;
  wildcards: boolean;
}

function translateLike(text: string, escape: string | undefined): TranslatedPattern {
  if (escape !== undefined && escape.length !== 1) {
    throw new MalformedInputError(`LIKE escape must be a single character, got "${escape}"`);
  }
  let expr = '';
  let literal = '';
  let wildcards = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === escape && i + 1 < text.length) {
      i++;
      expr += escapeRegex(text.charAt(i));
      literal += text.charAt(i);
    } else if (ch === '%') {
      expr += '.*';
      wildcards = true;
    } else if (ch === '_') {
      expr += '.';
      wildcards = true;
    } else {
      expr += escapeRegex(ch);
      literal += ch;
    }
  }
  return { expr, literal, wildcards };
}

/**
 * Builds the match fragment for the LIKE family. Returns the text itself
 * when plain equality is enough, otherwise a `$regex` document.
 */
export function buildPatternFragment(text: string, flags: PatternFlags = {}): string | FilterDocument {
  const caseSensitive = flags.caseSensitive ?? true;
  const startsWith = flags.startsWith ?? false;
  const endsWith = flags.endsWith ?? false;
  const wholeString = flags.wholeString ?? true;

  const { expr, literal, wildcards } =
    flags.likeWildcards === true
      ? translateLike(text, flags.escape)
      : { expr: escapeRegex(text), literal: text, wildcards: false };

  const needRegex = wholeString || !caseSensitive || startsWith || endsWith || wildcards;
  if (!needRegex) return literal;

  let pattern: string;
  if (startsWith) pattern = `^${expr}`;
  else if (endsWith) pattern = `${expr}$`;
  else if (wholeString) pattern = `^${expr}$`;
  else pattern = expr;

  const regex: FilterDocument = { $regex: pattern };
  if (!caseSensitive) regex['$options'] = 'i';
  return regex;
}
