/**
 * Analysis strategies
 *
 * The API depends only on AnalysisStrategy, so a real vision model can be
 * dropped in later without touching the ROI calculator or the routes.
 */

import { AnalysisReport, RooftopImage } from '../types/analysis';
import { AppConfig } from '../config';
import { RandomSource, createRandomSource } from '../utils/random';
import { createLogger } from '../utils/logger';
import { simulateRooftopAnalysis, SimulationOptions } from './simulator';

const logger = createLogger('ANALYSIS');

export interface AnalysisStrategy {
  readonly name: string;
  analyze(image: RooftopImage): Promise<AnalysisReport>;
}

export interface RandomStrategyOptions extends Omit<SimulationOptions, 'random'> {
  /** Fixed seed: every call restarts from it, so equal images give equal reports */
  seed?: number;
  /** Shared source advanced by every call; takes precedence over `seed` */
  random?: RandomSource;
}

/**
 * Demo strategy: random values bounded by the image size
 */
export class RandomAnalysisStrategy implements AnalysisStrategy {
  readonly name = 'random-simulation';
  private readonly seed?: number;
  private readonly random?: RandomSource;
  private readonly simulation: Omit<SimulationOptions, 'random'>;

  constructor(options: RandomStrategyOptions = {}) {
    const { seed, random, ...simulation } = options;
    this.seed = seed;
    this.random = random;
    this.simulation = simulation;
  }

  async analyze(image: RooftopImage): Promise<AnalysisReport> {
    // No state carries over between calls unless the caller shares a source
    const report = simulateRooftopAnalysis(image.width, image.height, {
      ...this.simulation,
      random: this.random ?? createRandomSource(this.seed),
    });

    logger.debug('Simulated rooftop analysis', {
      action: 'analyze',
      width: image.width,
      height: image.height,
      source: image.source,
      solarPotentialPercent: report.solarPotentialPercent,
    });

    return report;
  }
}

/**
 * Build the default strategy from configuration.
 * A per-call seed overrides the configured one.
 */
export function createAnalysisStrategy(
  cfg: Pick<AppConfig, 'analysis'>,
  overrides: { seed?: number } = {}
): AnalysisStrategy {
  return new RandomAnalysisStrategy({
    seed: overrides.seed ?? cfg.analysis.seed,
    panelTypes: cfg.analysis.panelTypes,
    mountingTypes: cfg.analysis.mountingTypes,
    electricalConfigs: cfg.analysis.electricalConfigs,
  });
}
