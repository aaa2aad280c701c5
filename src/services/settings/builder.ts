/**
 * Chainable construction of a {@link Settings} object.
 *
 * @example
 * ```typescript
 * const settings = new SettingsBuilder()
 *   .withStopWords(["a", "the", "of"])
 *   .withFilterableAttributes(["genres", "release_date"])
 *   .withPagination({ maxTotalHits: 100 })
 *   .build();
 * ```
 */

import type {
  FacetingSettings,
  PaginationSettings,
  Settings,
} from "./types";

export class SettingsBuilder {
  constructor(private readonly settings: Settings = {}) {}

  withSynonyms(
    synonyms: Readonly<Record<string, Iterable<string>>>
  ): SettingsBuilder {
    const entries: Record<string, ReadonlyArray<string>> = {};
    for (const [word, equivalents] of Object.entries(synonyms)) {
      entries[word] = Array.from(equivalents);
    }
    return this.merge({ synonyms: entries });
  }

  withStopWords(stopWords: Iterable<string>): SettingsBuilder {
    return this.merge({ stopWords: Array.from(stopWords) });
  }

  withRankingRules(rankingRules: Iterable<string>): SettingsBuilder {
    return this.merge({ rankingRules: Array.from(rankingRules) });
  }

  withFilterableAttributes(attributes: Iterable<string>): SettingsBuilder {
    return this.merge({ filterableAttributes: Array.from(attributes) });
  }

  withSortableAttributes(attributes: Iterable<string>): SettingsBuilder {
    return this.merge({ sortableAttributes: Array.from(attributes) });
  }

  withDistinctAttribute(attribute: string): SettingsBuilder {
    return this.merge({ distinctAttribute: attribute });
  }

  withSearchableAttributes(attributes: Iterable<string>): SettingsBuilder {
    return this.merge({ searchableAttributes: Array.from(attributes) });
  }

  withDisplayedAttributes(attributes: Iterable<string>): SettingsBuilder {
    return this.merge({ displayedAttributes: Array.from(attributes) });
  }

  withPagination(pagination: PaginationSettings): SettingsBuilder {
    return this.merge({ pagination });
  }

  withFaceting(faceting: FacetingSettings): SettingsBuilder {
    return this.merge({ faceting });
  }

  build(): Settings {
    return { ...this.settings };
  }

  private merge(patch: Settings): SettingsBuilder {
    return new SettingsBuilder({ ...this.settings, ...patch });
  }
}
