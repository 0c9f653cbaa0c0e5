/**
 * MCP tool definitions and dispatch.
 *
 * Each tool resolves its readings (caller-supplied batch first, the Dexcom
 * client otherwise), runs one analysis and renders a snake_case payload.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { generateAgpReport } from './agp-report.js';
import { checkAlerts } from './alerts.js';
import { exportReadings } from './data-export.js';
import { analyzeEpisodes, summarizeEpisodes } from './episodes.js';
import { ValidationError } from './errors.js';
import { calculateStatistics } from './glucose-analytics.js';
import { normalizeReadings, normalizeRecords, type ReadingOrder } from './readings.js';
import { describeCurrent, summarizeStatus } from './status.js';
import { analyzeTimeBlocks } from './time-blocks.js';
import {
  DEFAULT_THRESHOLDS,
  type GlucoseSource,
  MAX_COUNT,
  MAX_MINUTES,
  type NoData,
  type Reading,
  type ThresholdSet
} from './types.js';
import {
  renderAgpReport,
  renderAlertCheck,
  renderCurrent,
  renderEpisodeDetails,
  renderEpisodeSummary,
  renderExport,
  renderReading,
  renderStatistics,
  renderStatus,
  renderTimeBlocks,
  type Payload
} from './render.js';

export interface ToolContext {
  /** Lazily creates the acquisition client; not called when a batch is supplied. */
  getSource: () => GlucoseSource;
  now: () => Date;
}

const DATA_SCHEMA = {
  type: 'array',
  description:
    'Optional external readings for persistence layer integration. When given, no Dexcom request is made. Schema: [{"glucose_mg_dl": int, "timestamp": "ISO-8601"}, ...]',
  items: {
    type: 'object',
    properties: {
      glucose_mg_dl: { type: 'integer' },
      timestamp: { type: 'string' }
    },
    required: ['glucose_mg_dl', 'timestamp']
  }
};

function minutesSchema(defaultMinutes: number, description: string) {
  return {
    type: 'integer',
    description: `${description} (1-1440, default ${defaultMinutes})`
  };
}

const LOW_SCHEMA = { type: 'integer', description: 'Low threshold in mg/dL (default 70)' };
const HIGH_SCHEMA = { type: 'integer', description: 'High threshold in mg/dL (default 180)' };
const URGENT_LOW_SCHEMA = { type: 'integer', description: 'Urgent low threshold in mg/dL (default 54)' };
const URGENT_HIGH_SCHEMA = { type: 'integer', description: 'Urgent high threshold in mg/dL (default 250)' };

// Tool definitions
export const tools: Tool[] = [
  {
    name: 'get_current_glucose',
    description:
      'Get the current glucose reading: value in mg/dL and mmol/L, trend direction and arrow, and timestamp. The reading must be within the last 10 minutes.',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'get_glucose_readings',
    description: 'Get historical glucose readings, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(60, 'Number of minutes to look back'),
        max_count: { type: 'integer', description: 'Maximum readings to return (1-288, default 12)' },
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'get_statistics',
    description:
      'Get glucose statistics for a time period: mean, standard deviation, coefficient of variation, min/max and time in five glucose ranges.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Number of minutes to analyze'),
        low: LOW_SCHEMA,
        high: HIGH_SCHEMA,
        urgent_low: URGENT_LOW_SCHEMA,
        urgent_high: URGENT_HIGH_SCHEMA,
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'get_status_summary',
    description:
      'Get a complete status summary - the "how am I doing?" tool. Returns current glucose, stats for the period, recent low/high alerts and a plain-English summary with urgency level.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(180, 'Time period for context stats')
      },
      required: []
    }
  },
  {
    name: 'detect_episodes',
    description: 'Detect hypoglycemic and hyperglycemic episodes with duration, extreme value and totals.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Time period if using the Dexcom API'),
        low: LOW_SCHEMA,
        high: HIGH_SCHEMA,
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'get_episode_details',
    description:
      'Get detailed context for each glucose episode - what led to it, how severe it was, and how recovery went (rates, time back in range, overcorrection).',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Time period if using the Dexcom API'),
        low: LOW_SCHEMA,
        high: HIGH_SCHEMA,
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'analyze_time_blocks',
    description:
      'Analyze glucose by time of day - overnight (00-06), morning (06-12), afternoon (12-18) and evening (18-24) - to find when problems happen.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Time period if using the Dexcom API'),
        low: LOW_SCHEMA,
        high: HIGH_SCHEMA,
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'check_alerts',
    description: 'Check current glucose against alert thresholds and fast-moving trends.',
    inputSchema: {
      type: 'object',
      properties: {
        urgent_low: URGENT_LOW_SCHEMA,
        low: LOW_SCHEMA,
        high: HIGH_SCHEMA,
        urgent_high: URGENT_HIGH_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'export_data',
    description:
      'Export glucose readings in a consistent schema for storage in external databases, as JSON or with an additional CSV rendering.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Time period to export'),
        format: { type: 'string', enum: ['json', 'csv'], description: 'Export format (default json)' },
        data: DATA_SCHEMA
      },
      required: []
    }
  },
  {
    name: 'get_agp_report',
    description:
      'Generate an Ambulatory Glucose Profile (AGP) report: glucose percentiles by hour of day, GMI, variability and time in ranges against clinical targets.',
    inputSchema: {
      type: 'object',
      properties: {
        minutes: minutesSchema(1440, 'Time period if using the Dexcom API'),
        data: DATA_SCHEMA
      },
      required: []
    }
  }
];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function minutesArg(defaultMinutes: number) {
  return z
    .number()
    .optional()
    .transform(v => clamp(Math.trunc(v ?? defaultMinutes), 1, MAX_MINUTES));
}

function thresholdArg(defaultValue: number) {
  return z
    .number()
    .optional()
    .transform(v => v ?? defaultValue);
}

const zData = z.array(z.unknown()).nullish();

const zThresholds = {
  low: thresholdArg(DEFAULT_THRESHOLDS.low),
  high: thresholdArg(DEFAULT_THRESHOLDS.high),
  urgent_low: thresholdArg(DEFAULT_THRESHOLDS.urgentLow),
  urgent_high: thresholdArg(DEFAULT_THRESHOLDS.urgentHigh)
};

const argSchemas = {
  readings: z.object({
    minutes: minutesArg(60),
    max_count: z
      .number()
      .optional()
      .transform(v => clamp(Math.trunc(v ?? 12), 1, MAX_COUNT)),
    data: zData
  }),
  analysis: z.object({ minutes: minutesArg(1440), ...zThresholds, data: zData }),
  status: z.object({ minutes: minutesArg(180) }),
  alerts: z.object(zThresholds),
  export: z.object({
    minutes: minutesArg(1440),
    format: z.enum(['json', 'csv']).optional().transform(v => v ?? 'json'),
    data: zData
  }),
  agp: z.object({ minutes: minutesArg(1440), data: zData })
};

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid argument ${issue.path.join('.') || 'arguments'}: ${issue.message}`);
  }
  return parsed.data;
}

function toThresholds(args: { low: number; high: number; urgent_low: number; urgent_high: number }): ThresholdSet {
  return { low: args.low, high: args.high, urgentLow: args.urgent_low, urgentHigh: args.urgent_high };
}

/**
 * Caller batch wins over acquisition; the client is only created without one.
 */
async function loadReadings(
  minutes: number,
  data: unknown[] | null | undefined,
  context: ToolContext,
  order: ReadingOrder = 'asc'
): Promise<Reading[]> {
  if (data !== null && data !== undefined) {
    return normalizeRecords(data, { order });
  }
  const readings = await context.getSource().getReadings(minutes, MAX_COUNT);
  return normalizeReadings(readings, { order });
}

function renderNoData(result: NoData): Payload {
  return { status: result.status, message: result.message };
}

/**
 * Run one tool and return its JSON payload.
 */
export async function callTool(name: string, args: unknown, context: ToolContext): Promise<Payload> {
  switch (name) {
    case 'get_current_glucose': {
      const reading = await context.getSource().getCurrentReading();
      if (!reading) {
        return {
          status: 'no_data',
          message: 'No current glucose reading available (must be within 10 minutes)'
        };
      }
      return renderCurrent(describeCurrent(reading));
    }

    case 'get_glucose_readings': {
      const { minutes, max_count, data } = parseArgs(argSchemas.readings, args);
      const readings =
        data !== null && data !== undefined
          ? normalizeRecords(data, { order: 'desc', maxCount: max_count })
          : normalizeReadings(await context.getSource().getReadings(minutes, max_count), {
              order: 'desc',
              maxCount: max_count
            });

      if (readings.length === 0) {
        return { status: 'no_data', message: 'No readings found', readings: [] };
      }
      return { count: readings.length, readings: readings.map(renderReading) };
    }

    case 'get_statistics': {
      const parsed = parseArgs(argSchemas.analysis, args);
      const readings = await loadReadings(parsed.minutes, parsed.data, context);
      const result = calculateStatistics(
        readings.map(r => r.value),
        toThresholds(parsed)
      );
      return result.status === 'no_data' ? renderNoData(result) : renderStatistics(result.report);
    }

    case 'get_status_summary': {
      const { minutes } = parseArgs(argSchemas.status, args);
      const source = context.getSource();
      const maxCount = Math.min(MAX_COUNT, Math.floor(minutes / 5) + 1);
      const [current, readings] = await Promise.all([
        source.getCurrentReading(),
        source.getReadings(minutes, maxCount)
      ]);
      const result = summarizeStatus(current, readings, minutes);
      return result.status === 'no_data' ? renderNoData(result) : renderStatus(result.report);
    }

    case 'detect_episodes': {
      const parsed = parseArgs(argSchemas.analysis, args);
      const readings = await loadReadings(parsed.minutes, parsed.data, context);
      const result = summarizeEpisodes(readings, toThresholds(parsed));
      return result.status === 'no_data' ? renderNoData(result) : renderEpisodeSummary(result.report);
    }

    case 'get_episode_details': {
      const parsed = parseArgs(argSchemas.analysis, args);
      const readings = await loadReadings(parsed.minutes, parsed.data, context);
      const result = analyzeEpisodes(readings, toThresholds(parsed));
      return result.status === 'no_data' ? renderNoData(result) : renderEpisodeDetails(result.report);
    }

    case 'analyze_time_blocks': {
      const parsed = parseArgs(argSchemas.analysis, args);
      const readings = await loadReadings(parsed.minutes, parsed.data, context);
      const result = analyzeTimeBlocks(readings, toThresholds(parsed));
      return result.status === 'no_data' ? renderNoData(result) : renderTimeBlocks(result.report);
    }

    case 'check_alerts': {
      const parsed = parseArgs(argSchemas.alerts, args);
      const reading = await context.getSource().getCurrentReading();
      if (!reading) {
        return { status: 'no_data', message: 'No current reading available', alerts: [] };
      }
      return renderAlertCheck(checkAlerts(reading, toThresholds(parsed)));
    }

    case 'export_data': {
      const { minutes, format, data } = parseArgs(argSchemas.export, args);
      const supplied = data !== null && data !== undefined;
      const readings = await loadReadings(minutes, data, context, 'desc');
      const result = exportReadings(readings, {
        format,
        periodMinutes: supplied ? null : minutes,
        exportedAt: context.now()
      });
      return result.status === 'no_data' ? renderNoData(result) : renderExport(result.report);
    }

    case 'get_agp_report': {
      const { minutes, data } = parseArgs(argSchemas.agp, args);
      const readings = await loadReadings(minutes, data, context);
      const result = generateAgpReport(readings, minutes);
      return result.status === 'no_data' ? renderNoData(result) : renderAgpReport(result.report);
    }

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}
