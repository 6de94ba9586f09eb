/**
 * =============================================================================
 * SAMPLING PIPELINE - One invocation, start to finish
 * =============================================================================
 *
 * FLOW:
 *   DirectionSelector -> SKIP?  stop, nothing touched
 *   LocationResolver  -> origin, destination coordinates
 *   RouteClient       -> raw alternatives (one request)
 *   RouteExtractor    -> metrics for every alternative, before any write
 *   BatchWriter       -> one transaction
 *
 * Errors propagate unchanged; the caller logs them and exits non-zero.
 * =============================================================================
 */

import {
  Direction,
  ErrorCode,
  TravelDirection,
  UpstreamError,
} from '../../core';
import type { AppConfig } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import type { SampleMetrics } from '../../shared/database/repository.interface';
import type { LocationResolver } from '../locations/location.resolver';
import type { RouteClient } from '../routing/routing.schema';
import { extractRoutes } from '../routing/route.extractor';
import type { BatchWriter } from './batch.writer';
import { describeDirection, localTimeOf, selectDirection } from './direction.selector';

export type PipelineSettings = Pick<AppConfig, 'home' | 'work' | 'timezone' | 'forcedDirection'>;

export interface PipelineDependencies {
  resolver: LocationResolver;
  routeClient: RouteClient;
  batchWriter: BatchWriter;
}

export interface SkippedRun {
  status: 'skipped';
  direction: Direction.SKIP;
}

export interface CommittedRun {
  status: 'committed';
  direction: TravelDirection;
  batchId: string;
  batchTs: string;
  origin: string;
  destination: string;
  samples: SampleMetrics[];
}

export type RunOutcome = SkippedRun | CommittedRun;

export class SamplingPipeline {
  constructor(
    private readonly settings: PipelineSettings,
    private readonly deps: PipelineDependencies,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async run(now: Date = this.clock()): Promise<RunOutcome> {
    const localTime = localTimeOf(now, this.settings.timezone);
    const direction = selectDirection(localTime, this.settings.forcedDirection);

    if (direction === Direction.SKIP) {
      logger.info('Outside configured commute windows; no request made.', {
        localTime: formatTime(localTime.hour, localTime.minute),
        timezone: this.settings.timezone,
      });
      return { status: 'skipped', direction };
    }

    const { origin, destination } = describeDirection(direction, this.settings);
    logger.info(`🚗 Sampling ${origin.label} -> ${destination.label}`, {
      direction,
      forced: this.settings.forcedDirection !== undefined,
    });

    const originCoords = await this.deps.resolver.resolve(origin.label, origin.address);
    const destCoords = await this.deps.resolver.resolve(destination.label, destination.address);

    const rawRoutes = await this.deps.routeClient.getRoutes(originCoords, destCoords);
    const samples = extractRoutes(rawRoutes);

    // null only for an empty list, which never reaches the database
    const receipt = this.deps.batchWriter.commit(origin.label, destination.label, samples);
    if (!receipt) {
      throw new UpstreamError('Routes API failed: no routes returned', ErrorCode.ROUTES_EMPTY);
    }

    for (const sample of samples) {
      logger.info(
        `[${receipt.batchId}] ${origin.label} -> ${destination.label}: ${sample.description} | ` +
        `${sample.durationMinutes} min | ${(sample.meters / 1000).toFixed(1)} km / ${sample.miles} mi`
      );
    }

    return {
      status: 'committed',
      direction,
      batchId: receipt.batchId,
      batchTs: receipt.batchTs,
      origin: origin.label,
      destination: destination.label,
      samples,
    };
  }
}

function formatTime(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}
