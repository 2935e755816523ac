/**
 * Aggregator / Filter Engine
 *
 * Owns the single view cache of a snapshot: filtered views are keyed by
 * their normalized filter and kept in least-recently-used order up to
 * `maxViews` entries.
 */

import type { Observation } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { createMatcher, filterCacheKey, normalizeFilter, type FilterSpec } from './filter-spec.js';
import { FilteredView } from './filtered-view.js';

const log = createLogger({ module: 'aggregator' });

export interface AggregatorOptions {
  readonly maxViews?: number;
}

export interface AggregatorStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
  readonly maxViews: number;
}

const DEFAULT_MAX_VIEWS = 64;

export class Aggregator {
  private readonly views = new Map<string, FilteredView>();
  private readonly maxViews: number;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly observations: readonly Observation[],
    options: AggregatorOptions = {}
  ) {
    this.maxViews = Math.max(1, options.maxViews ?? DEFAULT_MAX_VIEWS);
  }

  /**
   * Filtered view for `spec`, from cache when an equal filter was seen.
   *
   * @throws ValidationError for an invalid spec
   */
  filter(spec: FilterSpec = {}): FilteredView {
    const normalized = normalizeFilter(spec);
    const key = filterCacheKey(normalized);

    const cached = this.views.get(key);
    if (cached !== undefined) {
      this.hits += 1;
      // Re-insert to mark as most recently used
      this.views.delete(key);
      this.views.set(key, cached);
      return cached;
    }

    this.misses += 1;
    const view = new FilteredView(normalized, this.observations.filter(createMatcher(normalized)));
    this.views.set(key, view);

    if (this.views.size > this.maxViews) {
      const oldest = this.views.keys().next();
      if (!oldest.done) {
        this.views.delete(oldest.value);
      }
    }

    log.debug('Filtered view computed', { key, rows: view.size });
    return view;
  }

  /** Drop every cached view */
  evict(): void {
    this.views.clear();
  }

  stats(): AggregatorStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.views.size,
      maxViews: this.maxViews,
    };
  }
}
