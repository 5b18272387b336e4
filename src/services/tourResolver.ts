/**
 * Tour resolver
 *
 * Runs an ordered list of strategies for one tour, merging every result into
 * the best record so far, until the record is good enough for the caller.
 */

import type { AuthContext, Tour } from '../types/index.js';
import { Logger } from '../crawler/komoot/utils/logger.js';
import { isTourEnhanced } from '../utils/classification.js';
import { mergeTours } from '../utils/deduplication.js';
import { ResolutionError, errorMessage, type StrategyFailure } from '../utils/errors.js';

export interface ResolveContext {
  anonymous: boolean;
  auth?: AuthContext;
  signal?: AbortSignal;
  /** Record already known for the tour; strategies add to it */
  seed?: Tour;
  /** Keep going until a track is found, not only until enhanced */
  requireTrack?: boolean;
}

export interface TourStrategy {
  readonly name: string;
  resolve(tourId: string, context: ResolveContext): Promise<Tour>;
}

export interface ResolvedTour {
  tour: Tour;
  /** Strategy that completed the record, or the last one that contributed */
  source: string;
  failures: StrategyFailure[];
}

function isSatisfied(tour: Tour, context: ResolveContext): boolean {
  if (!isTourEnhanced(tour)) return false;
  return !context.requireTrack || (tour.track_points?.length ?? 0) > 0;
}

export class TourResolver {
  private strategies: TourStrategy[];
  private logger: Logger;

  constructor(strategies: TourStrategy[]) {
    this.strategies = strategies;
    this.logger = new Logger('TourResolver');
  }

  get strategyNames(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  async resolve(tourId: string, context: ResolveContext): Promise<ResolvedTour> {
    let best: Tour = context.seed ? mergeTours({ id: tourId }, context.seed) : { id: tourId };
    let source = context.seed ? 'seed' : 'none';
    const failures: StrategyFailure[] = [];

    if (isSatisfied(best, context)) {
      return { tour: best, source, failures };
    }

    for (const strategy of this.strategies) {
      if (context.signal?.aborted) break;

      try {
        const result = await strategy.resolve(tourId, context);
        best = mergeTours(best, { ...result, id: tourId });
        source = strategy.name;

        if (isSatisfied(best, context)) {
          this.logger.debug(`Tour ${tourId} resolved by ${strategy.name}`);
          return { tour: best, source, failures };
        }
      } catch (error) {
        const message = errorMessage(error);
        failures.push({ strategy: strategy.name, message });
        this.logger.warn(`Tour ${tourId}: ${strategy.name} failed:`, message);
      }
    }

    if (failures.length === this.strategies.length) {
      throw new ResolutionError(tourId, failures);
    }

    this.logger.debug(`Tour ${tourId}: keeping best partial record from ${source}`);
    return { tour: best, source, failures };
  }
}
