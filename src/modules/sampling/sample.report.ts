/**
 * Read-side helpers for the `report` command: turn CLI options into a
 * SampleQuery and render the rows as plain text lines.
 */

import {
  DEFAULTS,
  DIRECTION_CODES,
  DirectionCode,
} from '../../core/constants';
import type { AppConfig } from '../../config/environment';
import type { SampleQuery, SampleRecord } from '../../shared/database/repository.interface';
import { describeDirection } from './direction.selector';

export interface ReportOptions {
  direction: DirectionCode;
  days: number;
  limit?: number;
  /** Disable the dashboard's 05:00-19:00 filter */
  allHours: boolean;
}

export function buildReportQuery(
  options: ReportOptions,
  config: Pick<AppConfig, 'home' | 'work' | 'timezone'>
): SampleQuery {
  const { origin, destination } = describeDirection(DIRECTION_CODES[options.direction], config);

  return {
    originLabel: origin.label,
    destLabel: destination.label,
    days: options.days,
    ...(!options.allHours && {
      timeOfDay: {
        start: DEFAULTS.REPORT_WINDOW_START,
        end: DEFAULTS.REPORT_WINDOW_END,
        timezone: config.timezone,
      },
    }),
    ...(options.limit !== undefined && { limit: options.limit }),
  };
}

export function formatReport(query: SampleQuery, rows: SampleRecord[]): string[] {
  const header = `${query.originLabel} -> ${query.destLabel} | last ${query.days} days | ${rows.length} samples`;
  if (rows.length === 0) {
    return [header, 'No data'];
  }

  return [
    header,
    ...rows.map(row =>
      `${row.createdAt}  ${row.durationMinutes} min (no traffic ${row.durationStaticMinutes} min)  ` +
      `${row.miles} mi  ${row.description}`
    ),
  ];
}
