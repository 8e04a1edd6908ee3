import JSON5 from 'json5';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z, ZodError } from 'zod';
import type { DeviceSettings } from '../domain/entities/Device.js';
import { ConfigurationError } from '../domain/errors.js';
import type { RejectionPolicy, TierRules } from '../domain/tierStateMachine.js';
import {
  TIER_SEQUENCE,
  allAdvancements,
  transitionKey,
  type TierRequirements,
} from '../domain/tiers.js';

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a configuration date. Values without an explicit offset are UTC,
 * so every cutoff compares against epoch milliseconds on the same clock.
 */
export function parseConfigDate(value: string): Date {
  const trimmed = value.trim();
  const normalized =
    DATE_ONLY.test(trimmed) || OFFSET_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid date: ${value}`);
  }
  return date;
}

const dateString = z.string().refine((value) => {
  try {
    parseConfigDate(value);
    return true;
  } catch {
    return false;
  }
}, 'must be an ISO-8601 date');

const tierSchema = z.enum(TIER_SEQUENCE);

const deviceSchema = z.object({
  enabled: z.boolean().default(true),
  currentTier: tierSchema.default('24h'),
  productionStartDate: dateString.optional(),
  bootstrapMode: z.boolean().optional(),
  exclude2h: z.boolean().default(false),
  /** Directory override, absolute or relative to scanPath */
  path: z.string().min(1).optional(),
});

const configSchema = z.object({
  scanPath: z.string().min(1),
  deviceSubdirectory: z.string().default('BIU'),
  productionStartDate: dateString.optional(),
  bootstrapMode: z.boolean().default(false),
  devices: z.record(z.string().min(1), deviceSchema),
  tierRequirements: z.record(z.string(), z.number().int().positive()),
  excludedTiers: z.array(tierSchema).default([]),
  fileFiltering: z
    .object({
      includeExtensions: z.array(z.string().min(1)).default([]),
      excludePatterns: z.array(z.string().min(1)).default([]),
      minFileSizeBytes: z.number().int().min(0).default(0),
    })
    .default({}),
  approval: z
    .object({
      rejectionPolicy: z.enum(['retain', 'reset']).default('retain'),
      approvalUrl: z.string().url().optional(),
    })
    .default({}),
});

export interface FileFilterRules {
  /** Lower-case, dot-prefixed; empty accepts every extension */
  includeExtensions: string[];
  /** Glob patterns matched against the file name */
  excludePatterns: string[];
  minFileSizeBytes: number;
}

export interface DeviceConfig extends DeviceSettings {
  id: string;
  directory: string;
}

export interface CounterConfig {
  scanPath: string;
  devices: DeviceConfig[];
  rules: TierRules;
  fileFiltering: FileFilterRules;
  approvalUrl: string | null;
}

function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function parseRequirements(raw: Record<string, number>): TierRequirements {
  const keys = allAdvancements().map(transitionKey);

  const unknownKeys = Object.keys(raw).filter((key) => !keys.some((known) => known === key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError('Unknown tier requirement keys', { keys: unknownKeys });
  }

  const missing = keys.filter((key) => raw[key] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError('Missing tier requirements', { keys: missing });
  }

  const requirements: TierRequirements = {};
  for (const key of keys) {
    requirements[key] = raw[key];
  }
  return requirements;
}

/**
 * Validates a parsed configuration object and resolves per-device defaults
 */
export function parseCounterConfig(raw: unknown, source = 'inline'): CounterConfig {
  let parsed: z.infer<typeof configSchema>;
  try {
    parsed = configSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid counter configuration in ${source}`, {
        issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    throw error;
  }

  const requirements = parseRequirements(parsed.tierRequirements);
  const scanPath = path.resolve(parsed.scanPath);

  const devices = Object.entries(parsed.devices).map(([id, device]): DeviceConfig => {
    const startDate = device.productionStartDate ?? parsed.productionStartDate;
    if (!startDate) {
      throw new ConfigurationError(`Device ${id} has no production start date`, {
        deviceId: id,
      });
    }

    return {
      id,
      enabled: device.enabled,
      currentTier: device.currentTier,
      productionStartDate: parseConfigDate(startDate),
      bootstrapMode: device.bootstrapMode ?? parsed.bootstrapMode,
      exclude2h: device.exclude2h,
      directory: device.path
        ? path.resolve(scanPath, device.path)
        : path.join(scanPath, id, parsed.deviceSubdirectory),
    };
  });

  const rejectionPolicy: RejectionPolicy = parsed.approval.rejectionPolicy;

  return {
    scanPath,
    devices,
    rules: {
      requirements,
      excludedTiers: parsed.excludedTiers,
      rejectionPolicy,
    },
    fileFiltering: {
      includeExtensions: parsed.fileFiltering.includeExtensions.map(normalizeExtension),
      excludePatterns: parsed.fileFiltering.excludePatterns,
      minFileSizeBytes: parsed.fileFiltering.minFileSizeBytes,
    },
    approvalUrl: parsed.approval.approvalUrl ?? null,
  };
}

export function parseCounterConfigText(text: string, source = 'inline'): CounterConfig {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Counter configuration ${source} is not valid JSON5`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parseCounterConfig(raw, source);
}

/**
 * Reads and validates the counter configuration file (JSON or JSON5)
 */
export async function loadCounterConfig(configPath: string): Promise<CounterConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Counter configuration ${configPath} could not be read`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parseCounterConfigText(text, configPath);
}
