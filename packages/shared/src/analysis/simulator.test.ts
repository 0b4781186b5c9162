/**
 * Unit tests for the simulated rooftop analysis
 * Covers bounds, rounding, draw order and input validation
 */

import { simulateRooftopAnalysis } from './simulator';
import { seededRandom, RandomSource } from '../utils/random';
import { PANEL_TYPES, MOUNTING_TYPES, ELECTRICAL_CONFIGS } from '../types/analysis';
import { ValidationError } from '../utils/errors';

// Returns the given values in order, then fails loudly if drawn again
function scripted(values: number[]): RandomSource {
  let i = 0;
  return () => {
    if (i >= values.length) {
      throw new Error(`Random source exhausted after ${values.length} draws`);
    }
    return values[i++];
  };
}

function decimals(value: number): number {
  const text = String(value);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

describe('simulateRooftopAnalysis', () => {
  describe('Scripted draws', () => {
    it('should use the lowest value of every range when the source returns 0', () => {
      const report = simulateRooftopAnalysis(1000, 1000, { random: scripted([0, 0, 0, 0, 0, 0, 0]) });

      expect(report).toEqual({
        solarPotentialPercent: 50,
        recommendedPanelType: 'Monocrystalline',
        mountingRecommendation: 'Roof-mounted',
        electricalConfig: 'Grid-tied',
        estimatedInstallationCost: 7500,   // floor(15000 × 0.5)
        expectedAnnualEnergyKwh: 2000,     // floor(4000 × 0.5)
        confidenceScore: 0.7,
      });
    });

    it('should draw potential, panel, mounting, electrical, cost, production, confidence in order', () => {
      const report = simulateRooftopAnalysis(1000, 1000, {
        random: scripted([0, 0.9, 0.4, 0.7, 0.5, 0.5, 0.4]),
      });

      expect(report.solarPotentialPercent).toBe(50);
      expect(report.recommendedPanelType).toBe('Thin-film');
      expect(report.mountingRecommendation).toBe('Ground-mounted');
      expect(report.electricalConfig).toBe('Hybrid');
      expect(report.estimatedInstallationCost).toBe(11250); // floor(22500 × 0.5)
      expect(report.expectedAnnualEnergyKwh).toBe(2750);    // floor(5500 × 0.5)
      expect(report.confidenceScore).toBe(0.8);
    });

    it('should consume exactly seven draws', () => {
      expect(() =>
        simulateRooftopAnalysis(640, 480, { random: scripted([0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7]) })
      ).not.toThrow();
    });
  });

  describe('Area cap', () => {
    it('should keep a 100x100 image between 0.5 and 1.0 percent', () => {
      // base potential = min(100, 10000 / 10000) = 1
      for (let seed = 1; seed <= 50; seed++) {
        const report = simulateRooftopAnalysis(100, 100, { random: seededRandom(seed) });
        expect(report.solarPotentialPercent).toBeGreaterThanOrEqual(0.5);
        expect(report.solarPotentialPercent).toBeLessThanOrEqual(1.0);
      }
    });

    it('should cap base potential at 100 for large images', () => {
      const report = simulateRooftopAnalysis(4000, 3000, { random: scripted([0.9999, 0, 0, 0, 0, 0, 0]) });
      // 0.99995 × 100 rounds up to 100.0
      expect(report.solarPotentialPercent).toBe(100);
    });

    it('should honour a custom area divisor', () => {
      const report = simulateRooftopAnalysis(100, 100, {
        areaDivisor: 200,
        random: scripted([0, 0, 0, 0, 0, 0, 0]),
      });
      // base = min(100, 10000 / 200) = 50, factor 0.5
      expect(report.solarPotentialPercent).toBe(25);
    });
  });

  describe('Invariants across seeds', () => {
    const sizes: Array<[number, number]> = [[1, 1], [100, 100], [320, 240], [1024, 768], [5000, 5000]];

    it.each(sizes)('should keep every field in range for %ix%i images', (width, height) => {
      for (let seed = 1; seed <= 200; seed++) {
        const report = simulateRooftopAnalysis(width, height, { random: seededRandom(seed) });

        expect(report.solarPotentialPercent).toBeGreaterThanOrEqual(0);
        expect(report.solarPotentialPercent).toBeLessThanOrEqual(100);
        expect(decimals(report.solarPotentialPercent)).toBeLessThanOrEqual(1);

        expect(report.confidenceScore).toBeGreaterThanOrEqual(0.7);
        expect(report.confidenceScore).toBeLessThanOrEqual(0.95);
        expect(decimals(report.confidenceScore)).toBeLessThanOrEqual(2);

        expect(Number.isInteger(report.estimatedInstallationCost)).toBe(true);
        expect(report.estimatedInstallationCost).toBeGreaterThanOrEqual(0);
        expect(Number.isInteger(report.expectedAnnualEnergyKwh)).toBe(true);
        expect(report.expectedAnnualEnergyKwh).toBeGreaterThanOrEqual(0);

        expect(PANEL_TYPES).toContain(report.recommendedPanelType);
        expect(MOUNTING_TYPES).toContain(report.mountingRecommendation);
        expect(ELECTRICAL_CONFIGS).toContain(report.electricalConfig);
      }
    });

    it('should eventually recommend every panel type', () => {
      const seen = new Set<string>();
      for (let seed = 1; seed <= 200; seed++) {
        seen.add(simulateRooftopAnalysis(800, 600, { random: seededRandom(seed) }).recommendedPanelType);
      }
      expect([...seen].sort()).toEqual([...PANEL_TYPES].sort());
    });
  });

  describe('Determinism', () => {
    it('should produce identical reports for the same seed', () => {
      const a = simulateRooftopAnalysis(1280, 720, { random: seededRandom(7) });
      const b = simulateRooftopAnalysis(1280, 720, { random: seededRandom(7) });
      expect(a).toEqual(b);
    });
  });

  describe('Custom enumerations', () => {
    it('should only pick from the configured panel types', () => {
      const report = simulateRooftopAnalysis(500, 500, {
        panelTypes: ['Polycrystalline'],
        random: seededRandom(3),
      });
      expect(report.recommendedPanelType).toBe('Polycrystalline');
    });
  });

  describe('Validation', () => {
    it('should reject zero width', () => {
      expect(() => simulateRooftopAnalysis(0, 100)).toThrow(ValidationError);
    });

    it('should reject negative height', () => {
      expect(() => simulateRooftopAnalysis(100, -5)).toThrow('Image height must be a positive integer, got -5');
    });

    it('should reject fractional dimensions', () => {
      expect(() => simulateRooftopAnalysis(10.5, 100)).toThrow(ValidationError);
    });
  });
});
