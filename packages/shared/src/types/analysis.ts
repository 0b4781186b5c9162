/**
 * Rooftop Analysis Types
 */

export const PANEL_TYPES = ['Monocrystalline', 'Polycrystalline', 'Thin-film'] as const;
export const MOUNTING_TYPES = ['Roof-mounted', 'Ground-mounted', 'Building-integrated'] as const;
export const ELECTRICAL_CONFIGS = ['Grid-tied', 'Off-grid', 'Hybrid'] as const;

export type PanelType = typeof PANEL_TYPES[number];
export type MountingType = typeof MOUNTING_TYPES[number];
export type ElectricalConfig = typeof ELECTRICAL_CONFIGS[number];

export interface ImageDimensions {
  width: number;
  height: number;
}

export type ImageSource = 'upload' | 'url';

/**
 * A decoded rooftop image as handed to an analysis strategy
 */
export interface RooftopImage extends ImageDimensions {
  source: ImageSource;
  /** MIME type detected from the image bytes */
  mimeType: 'image/jpeg' | 'image/png';
  bytes: Buffer;
}

export interface AnalysisReport {
  solarPotentialPercent: number;    // 0-100, one decimal
  recommendedPanelType: PanelType;
  mountingRecommendation: MountingType;
  electricalConfig: ElectricalConfig;
  estimatedInstallationCost: number; // whole currency units
  expectedAnnualEnergyKwh: number;   // whole kWh
  confidenceScore: number;           // 0.70-0.95, two decimals
}

/** Inclusive-exclusive [min, max) range for a uniform draw */
export type Range = readonly [min: number, max: number];
