// ──────────────────────────────────────────
// Configuration: environment schema
// ──────────────────────────────────────────

import { z } from 'zod';
import { ActivitySource, MetricName, METRIC_NAMES, Weekday } from '../shared/types';

const WEEKDAYS: Record<string, Weekday> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

const ACTIVITY_SOURCES: readonly ActivitySource[] = ['streams', 'urls', 'livestreams'];

const csv = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const epochDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'WEEK_EPOCH must be a YYYY-MM-DD date')
  .default('2024-09-29')
  .transform((value) => new Date(`${value}T00:00:00Z`))
  .refine((date) => !isNaN(date.getTime()), 'WEEK_EPOCH is not a valid date');

const weekAnchors = csv.transform((entries, ctx) => {
  const anchors: Partial<Record<MetricName, Weekday>> = {};
  for (const entry of entries) {
    const [metric, day] = entry.split('=').map((part) => part.trim().toLowerCase());
    const weekday = day === undefined ? undefined : WEEKDAYS[day];
    if (!isMetricName(metric) || weekday === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Bad WEEK_ANCHORS entry: ${entry}` });
      continue;
    }
    anchors[metric] = weekday;
  }
  return anchors;
});

const activitySources = z
  .string()
  .default('streams,urls')
  .transform((value, ctx) => {
    const sources: ActivitySource[] = [];
    for (const part of value.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
      const source = ACTIVITY_SOURCES.find((s) => s === part);
      if (!source) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown activity source: ${part}` });
        continue;
      }
      if (!sources.includes(source)) sources.push(source);
    }
    return sources;
  });

export const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  DASHBOARD_PORT: z.coerce.number().int().positive().default(3001),
  API_BASE: z.string().url().default('http://localhost:3000'),
  DASHBOARD_API_KEY: z.string().min(1).optional(),
  DEVELOPER_IDS: csv,
  WEEK_EPOCH: epochDate,
  WEEK_ANCHORS: weekAnchors,
  ACTIVE_USER_SOURCES: activitySources,
  MIN_URL_VIEWS: z.coerce.number().int().nonnegative().default(1),
  EARLY_PERIOD_FALLBACK_DAYS: z.coerce.number().int().nonnegative().default(1),
  FETCH_PAGE_SIZE: z.coerce.number().int().positive().max(10_000).default(1000),
  FORCE_FULL_RELOAD: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

export function getEnv(): Env {
  if (_env) return _env;
  _env = loadEnv();
  return _env;
}

function isMetricName(value: string | undefined): value is MetricName {
  return METRIC_NAMES.some((name) => name === value);
}
