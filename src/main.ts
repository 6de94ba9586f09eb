#!/usr/bin/env node
/**
 * =============================================================================
 * COMMUTE SAMPLER - ENTRY POINT
 * =============================================================================
 *
 * One process per scheduled tick (cron, systemd timer):
 *
 *   commute-sampler [sample]   decide direction, fetch routes, commit one batch
 *   commute-sampler init-db    create tables and indexes
 *   commute-sampler report [--direction H2W|W2H] [--days N] [--limit N] [--all-hours]
 *
 * EXIT CODES: 0 success or skip, 1 failure, 2 configuration error
 * =============================================================================
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { z } from 'zod';

import { AppConfig, EnvSource, loadConfig } from './config/environment';
import { DEFAULTS, EXIT_CODE, toAppError } from './core';
import { configureLogger, logError, logger } from './shared/services/logger.service';
import { SqliteService } from './shared/database/sqlite.service';
import { GoogleMapsService, FetchLike } from './shared/services/google-maps.service';
import { SqliteLocationRepository } from './modules/locations/location.repository';
import { LocationResolver } from './modules/locations/location.resolver';
import { SqliteSampleRepository } from './modules/sampling/sample.repository';
import { BatchWriter } from './modules/sampling/batch.writer';
import { SamplingPipeline } from './modules/sampling/sampling.pipeline';
import { buildReportQuery, formatReport } from './modules/sampling/sample.report';

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export interface SamplerServices {
  sqlite: SqliteService;
  pipeline: SamplingPipeline;
  sampleRepository: SqliteSampleRepository;
  googleMaps: GoogleMapsService;
}

export function buildServices(config: Readonly<AppConfig>, fetchImpl?: FetchLike): SamplerServices {
  const sqlite = new SqliteService(config.database.path);
  const googleMaps = new GoogleMapsService({ apiKey: config.googleMaps.apiKey, fetch: fetchImpl });
  const sampleRepository = new SqliteSampleRepository(sqlite);

  const pipeline = new SamplingPipeline(config, {
    resolver: new LocationResolver(new SqliteLocationRepository(sqlite), googleMaps),
    routeClient: googleMaps,
    batchWriter: new BatchWriter(sampleRepository),
  });

  return { sqlite, pipeline, sampleRepository, googleMaps };
}

// =============================================================================
// COMMANDS
// =============================================================================

const reportArgsSchema = z.object({
  direction: z.string().default('H2W').transform(v => v.toUpperCase()).pipe(z.enum(['H2W', 'W2H'])),
  days: z.coerce.number().int().positive().default(DEFAULTS.REPORT_DAYS),
  limit: z.coerce.number().int().positive().optional(),
  'all-hours': z.boolean().default(false),
});

async function runSample(config: Readonly<AppConfig>): Promise<number> {
  const services = buildServices(config);
  services.sqlite.migrate();

  const outcome = await services.pipeline.run();
  logger.debug('Google Maps calls', { ...services.googleMaps.getMetrics() });

  if (outcome.status === 'committed') {
    logger.info(`✅ Stored ${outcome.samples.length} route(s) in batch ${outcome.batchId}`);
  }
  return EXIT_CODE.OK;
}

function runInitDb(config: Readonly<AppConfig>): number {
  new SqliteService(config.database.path).migrate();
  logger.info(`✅ DB ready: ${config.database.path}`);
  return EXIT_CODE.OK;
}

function runReport(config: Readonly<AppConfig>, args: string[]): number {
  const { values } = parseArgs({
    args,
    options: {
      direction: { type: 'string' },
      days: { type: 'string' },
      limit: { type: 'string' },
      'all-hours': { type: 'boolean' },
    },
    strict: true,
  });

  const parsed = reportArgsSchema.safeParse(values);
  if (!parsed.success) {
    logger.error('Invalid report options', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return EXIT_CODE.FAILURE;
  }

  const query = buildReportQuery(
    {
      direction: parsed.data.direction,
      days: parsed.data.days,
      limit: parsed.data.limit,
      allHours: parsed.data['all-hours'],
    },
    config
  );

  // Reading never creates a database; run init-db or sample first
  const sqlite = new SqliteService(config.database.path, { fileMustExist: true });
  const rows = new SqliteSampleRepository(sqlite).findSamples(query);

  for (const line of formatReport(query, rows)) {
    console.log(line);
  }
  return EXIT_CODE.OK;
}

// =============================================================================
// MAIN
// =============================================================================

export async function main(argv: string[] = process.argv.slice(2), env: EnvSource = process.env): Promise<number> {
  const [command = 'sample', ...rest] = argv;

  try {
    const config = loadConfig(env);
    configureLogger(config);

    switch (command) {
      case 'sample':
        return await runSample(config);
      case 'init-db':
        return runInitDb(config);
      case 'report':
        return runReport(config, rest);
      default:
        logger.error(`Unknown command: ${command}. Use sample, init-db or report.`);
        return EXIT_CODE.FAILURE;
    }
  } catch (error) {
    const appError = toAppError(error);
    const label = appError.isOperational ? `❌ ${command} failed` : `💥 ${command} crashed`;
    logError(`${label}: ${appError.message}`, appError);
    return appError.exitCode;
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logError('Fatal error', error);
      process.exitCode = EXIT_CODE.FAILURE;
    }
  );
}
