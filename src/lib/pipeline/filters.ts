/**
 * Content filters
 * Annotate ideas that are too short, too old or not in an accepted language.
 * Filters never drop an idea; callers decide what to do with the reasons.
 */

import type { FilterConfig, FilterReason, FilterResult, Idea } from "../model";
import { looksNonEnglish } from "../utils/language";

const DAY_MS = 24 * 60 * 60 * 1000;

function englishOnly(languages: readonly string[]): boolean {
  return languages.length === 1 && languages[0].toLowerCase() === "en";
}

export function evaluateFilters(idea: Idea, filters: FilterConfig, now: Date = new Date()): FilterResult {
  const reasons: FilterReason[] = [];

  if (idea.content.length < filters.minContentLength) {
    reasons.push("content_too_short");
  }

  if (idea.publishedAt) {
    const ageMs = now.getTime() - idea.publishedAt.getTime();
    if (ageMs > filters.maxAgeDays * DAY_MS) {
      reasons.push("too_old");
    }
  }

  if (englishOnly(filters.languages) && looksNonEnglish(idea)) {
    reasons.push("unsupported_language");
  }

  return { passed: reasons.length === 0, reasons };
}
