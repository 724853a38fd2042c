import { z } from 'zod';
import { CompositeOptions } from './services/gee';

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'not a calendar date');

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    GEE_CREDENTIALS_FILE: z.string().min(1).default('./credentials.json'),
    GEE_COLLECTION: z.string().min(1).default('COPERNICUS/S2_HARMONIZED'),
    GEE_START_DATE: isoDate.default('2023-06-01'),
    GEE_END_DATE: isoDate.default('2023-08-31'),
    GEE_MAX_CLOUD_PERCENT: z.coerce.number().min(0).max(100).default(20),
    GEE_THUMBNAIL_DIMENSIONS: z.coerce.number().int().positive().default(512),
    GEE_MAX_RETRIES: z.coerce.number().int().min(0).default(1)
  })
  .refine((env) => env.GEE_START_DATE < env.GEE_END_DATE, {
    message: 'GEE_START_DATE must be before GEE_END_DATE',
    path: ['GEE_END_DATE']
  });

export type AppConfig = {
  port: number;
  credentialsFile: string;
  composite: CompositeOptions;
  thumbnailDimensions: number;
  maxRetries: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings in .env mean "unset".
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;
  return {
    port: vars.PORT,
    credentialsFile: vars.GEE_CREDENTIALS_FILE,
    composite: {
      collection: vars.GEE_COLLECTION,
      startDate: vars.GEE_START_DATE,
      endDate: vars.GEE_END_DATE,
      maxCloudPercent: vars.GEE_MAX_CLOUD_PERCENT
    },
    thumbnailDimensions: vars.GEE_THUMBNAIL_DIMENSIONS,
    maxRetries: vars.GEE_MAX_RETRIES
  };
}
