/**
 * Shared Configuration
 */

import {
  PANEL_TYPES,
  MOUNTING_TYPES,
  ELECTRICAL_CONFIGS,
  PanelType,
  MountingType,
  ElectricalConfig,
} from './types/analysis';

// Malformed values come back as NaN or a fraction so validateEnv can report them
function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function list<T>(items: readonly T[]): T[] {
  return [...items];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    // Environment
    env: {
      isProduction: env.NODE_ENV === 'production',
      nodeEnv: env.NODE_ENV || 'development',
    },

    // Service ports
    ports: {
      api: parseInt(env.API_PORT || '4000'),
    },

    // ROI defaults; callers may override per request
    roi: {
      energyCostPerKwh: parseFloat(env.ENERGY_COST_PER_KWH || '0.13'),
      incentiveRate: parseFloat(env.INCENTIVE_RATE || '0.26'), // federal tax credit
      lifespanYears: parseInt(env.PANEL_LIFESPAN_YEARS || '25'),
    },

    // Simulated analysis
    analysis: {
      // Unset means a fresh Math.random draw per request
      seed: optionalInt(env.ANALYSIS_SEED),
      panelTypes: list<PanelType>(PANEL_TYPES),
      mountingTypes: list<MountingType>(MOUNTING_TYPES),
      electricalConfigs: list<ElectricalConfig>(ELECTRICAL_CONFIGS),
    },

    // Image input limits
    image: {
      maxBytes: parseInt(env.IMAGE_MAX_BYTES || String(5 * 1024 * 1024)),
      fetchTimeoutMs: parseInt(env.IMAGE_FETCH_TIMEOUT_MS || '15000'),
    },

    // HTTP security
    http: {
      corsOrigins: env.CORS_ORIGINS?.split(',').filter(Boolean) || '*',
      rateLimitWindowMs: 15 * 60 * 1000, // 15 minutes
      rateLimitMax: parseInt(env.RATE_LIMIT_MAX || '300'),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

/**
 * Validate environment-derived configuration
 */
export function validateEnv(cfg: AppConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.ports.api) || cfg.ports.api <= 0) {
    errors.push('API_PORT must be a positive integer');
  }
  if (!Number.isFinite(cfg.roi.energyCostPerKwh) || cfg.roi.energyCostPerKwh < 0) {
    errors.push('ENERGY_COST_PER_KWH must be a non-negative number');
  }
  if (!Number.isFinite(cfg.roi.incentiveRate) || cfg.roi.incentiveRate < 0 || cfg.roi.incentiveRate > 1) {
    errors.push('INCENTIVE_RATE must be between 0 and 1');
  }
  if (!Number.isInteger(cfg.roi.lifespanYears) || cfg.roi.lifespanYears <= 0) {
    errors.push('PANEL_LIFESPAN_YEARS must be a positive integer');
  }
  if (cfg.analysis.seed !== undefined && !Number.isInteger(cfg.analysis.seed)) {
    errors.push('ANALYSIS_SEED must be an integer');
  }
  if (!Number.isInteger(cfg.image.maxBytes) || cfg.image.maxBytes <= 0) {
    errors.push('IMAGE_MAX_BYTES must be a positive integer');
  }
  if (!Number.isInteger(cfg.image.fetchTimeoutMs) || cfg.image.fetchTimeoutMs <= 0) {
    errors.push('IMAGE_FETCH_TIMEOUT_MS must be a positive integer');
  }

  return { valid: errors.length === 0, errors };
}
