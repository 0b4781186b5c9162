/**
 * Unit tests for analysis strategies
 */

import { RandomAnalysisStrategy, createAnalysisStrategy } from './strategy';
import { simulateRooftopAnalysis } from './simulator';
import { seededRandom } from '../utils/random';
import { loadConfig } from '../config';
import { RooftopImage } from '../types/analysis';

function image(width: number, height: number): RooftopImage {
  return { width, height, source: 'upload', mimeType: 'image/png', bytes: Buffer.alloc(0) };
}

describe('Analysis strategies', () => {
  describe('RandomAnalysisStrategy', () => {
    it('should match the simulator for the same seed', async () => {
      const strategy = new RandomAnalysisStrategy({ seed: 11 });
      const report = await strategy.analyze(image(800, 600));

      expect(report).toEqual(simulateRooftopAnalysis(800, 600, { random: seededRandom(11) }));
    });

    it('should prefer an explicit random source over a seed', async () => {
      const strategy = new RandomAnalysisStrategy({ seed: 11, random: () => 0 });
      const report = await strategy.analyze(image(1000, 1000));

      expect(report.solarPotentialPercent).toBe(50);
      expect(report.recommendedPanelType).toBe('Monocrystalline');
    });

    it('should restart from its seed on every call', async () => {
      const strategy = new RandomAnalysisStrategy({ seed: 5 });
      const first = await strategy.analyze(image(900, 900));
      const second = await strategy.analyze(image(900, 900));

      expect(first).toEqual(simulateRooftopAnalysis(900, 900, { random: seededRandom(5) }));
      expect(second).toEqual(first);
    });

    it('should advance a shared random source between calls', async () => {
      const draws = [0, 0, 0, 0, 0, 0, 0, 0.9999, 0, 0, 0, 0, 0, 0];
      let i = 0;
      const strategy = new RandomAnalysisStrategy({ random: () => draws[i++] });

      const first = await strategy.analyze(image(1000, 1000));
      const second = await strategy.analyze(image(1000, 1000));

      expect(first.solarPotentialPercent).toBe(50);
      expect(second.solarPotentialPercent).toBe(100);
    });

    it('should reject images without positive dimensions', async () => {
      const strategy = new RandomAnalysisStrategy({ seed: 1 });
      await expect(strategy.analyze(image(0, 10))).rejects.toThrow('Image width must be a positive integer, got 0');
    });
  });

  describe('createAnalysisStrategy', () => {
    it('should use the configured seed', async () => {
      const cfg = loadConfig({ ANALYSIS_SEED: '99' });
      const a = await createAnalysisStrategy(cfg).analyze(image(640, 480));
      const b = await createAnalysisStrategy(cfg).analyze(image(640, 480));

      expect(a).toEqual(b);
    });

    it('should let a per-call seed override the configured one', async () => {
      const cfg = loadConfig({ ANALYSIS_SEED: '99' });
      const report = await createAnalysisStrategy(cfg, { seed: 3 }).analyze(image(640, 480));

      expect(report).toEqual(simulateRooftopAnalysis(640, 480, { random: seededRandom(3) }));
    });

    it('should restrict picks to configured enumerations', async () => {
      const cfg = loadConfig({});
      cfg.analysis.mountingTypes = ['Building-integrated'];
      const report = await createAnalysisStrategy(cfg, { seed: 8 }).analyze(image(640, 480));

      expect(report.mountingRecommendation).toBe('Building-integrated');
    });

    it('should name itself', () => {
      expect(createAnalysisStrategy(loadConfig({})).name).toBe('random-simulation');
    });
  });
});
