/**
 * EnergyPipelineContext
 *
 * The owned, explicit replacement for process-wide cached tables. Built once
 * at startup; holds the current snapshot and the geometry cache.
 *
 * Reads go through one snapshot reference, so a caller sees either the old
 * or the new dataset across a reload, never a mix. A reload builds the new
 * snapshot completely before swapping it in; concurrent reload() calls share
 * one run, and a failed reload keeps the previous snapshot.
 */

import type { FilteredView } from '../analytics/filtered-view.js';
import type { FilterSpec } from '../analytics/filter-spec.js';
import type { DatasetConfig, PipelineConfig } from '../core/config.js';
import type { GeoShape, Observation } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { GeoExtractor } from '../geo/geo-extractor.js';
import { runPipeline, type DatasetSnapshot } from './pipeline.js';

const log = createLogger({ module: 'context' });

export interface ContextOptions {
  readonly sourcePath: string;
  readonly dataset?: Partial<DatasetConfig>;
  readonly maxViews?: number;
}

export class EnergyPipelineContext {
  private current: DatasetSnapshot;
  private pendingReload: Promise<DatasetSnapshot> | null = null;

  private constructor(
    private readonly options: ContextOptions,
    private readonly geoExtractor: GeoExtractor,
    snapshot: DatasetSnapshot
  ) {
    this.current = snapshot;
  }

  static async create(options: ContextOptions): Promise<EnergyPipelineContext> {
    const geoExtractor = new GeoExtractor();
    const snapshot = await runPipeline({ ...options, geoExtractor, version: 1 });
    return new EnergyPipelineContext(options, geoExtractor, snapshot);
  }

  static fromConfig(config: PipelineConfig): Promise<EnergyPipelineContext> {
    return EnergyPipelineContext.create({
      sourcePath: config.dataPath,
      dataset: config.dataset,
      maxViews: config.cache.maxViews,
    });
  }

  /** Current snapshot; hold on to it to keep reading one dataset */
  get snapshot(): DatasetSnapshot {
    return this.current;
  }

  get observations(): readonly Observation[] {
    return this.current.observations;
  }

  geoShapes(): ReadonlyMap<string, GeoShape> {
    return this.current.geo.shapes;
  }

  /** Region codes whose geometry could not be parsed */
  geoFailures(): readonly string[] {
    return this.current.geo.failedRegionCodes;
  }

  filter(spec: FilterSpec = {}): FilteredView {
    return this.current.aggregator.filter(spec);
  }

  geoCacheStats(): ReturnType<GeoExtractor['stats']> {
    return this.geoExtractor.stats();
  }

  /**
   * Re-read the source file and swap in the new snapshot.
   */
  reload(): Promise<DatasetSnapshot> {
    if (this.pendingReload !== null) {
      return this.pendingReload;
    }

    const previous = this.current;
    this.pendingReload = (async () => {
      try {
        this.geoExtractor.invalidate(this.options.sourcePath);
        const next = await runPipeline({
          ...this.options,
          geoExtractor: this.geoExtractor,
          version: previous.version + 1,
        });
        this.current = next;
        previous.aggregator.evict();
        log.info('Dataset reloaded', { version: next.version });
        return next;
      } finally {
        this.pendingReload = null;
      }
    })();

    return this.pendingReload;
  }
}
