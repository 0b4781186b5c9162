/**
 * API Routes - rooftop analysis and ROI estimates
 */

import { Router, Request, Response } from 'express';
import {
  AppConfig,
  AnalysisStrategy,
  RooftopImage,
  ValidationError,
  ImageLoadError,
  ErrorCodes,
  computeRoi,
  createAnalysisStrategy,
  createLogger,
  formatReport,
  formatRoiLines,
  getRequestId,
  errorMessage,
  PANEL_TYPES,
  MOUNTING_TYPES,
  ELECTRICAL_CONFIGS,
} from '@rooftop/shared';
import { ImageLoader } from './image-loader';

const logger = createLogger('API');

export interface RouteDependencies {
  config: AppConfig;
  imageLoader: ImageLoader;
  strategy: AnalysisStrategy;
}

type Body = Record<string, unknown>;

function asBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number`, field);
  }
  return value;
}

function requiredNumber(body: Body, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`, field);
  }
  return value;
}

function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field);
  }
  return value;
}

function statusFor(error: ImageLoadError): number {
  switch (error.type) {
    case 'unsupported_source':
      return 400;
    case 'too_large':
      return 413;
    default:
      return 422;
  }
}

/**
 * Map an error to the JSON error response; unexpected errors become 500
 */
export function sendError(res: Response, error: unknown, action: string): void {
  const request_id = getRequestId(res);

  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, code: error.code, field: error.field });
    return;
  }

  if (error instanceof ImageLoadError) {
    logger.warn(`Image load failed: ${error.detail ?? error.message}`, { action, request_id, type: error.type });
    res.status(statusFor(error)).json({ error: error.message, code: error.code });
    return;
  }

  logger.error(`Unexpected error: ${errorMessage(error)}`, { action, request_id });
  res.status(500).json({ error: 'Internal server error', code: ErrorCodes.INTERNAL_ERROR });
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const { config } = deps;

  /**
   * GET /api/config - defaults the demo page shows next to the form
   */
  router.get('/api/config', (req: Request, res: Response) => {
    res.json({
      roi: config.roi,
      strategy: deps.strategy.name,
      panelTypes: PANEL_TYPES,
      mountingTypes: MOUNTING_TYPES,
      electricalConfigs: ELECTRICAL_CONFIGS,
      maxImageBytes: config.image.maxBytes,
    });
  });

  /**
   * POST /api/analyze - load image, simulate analysis, compute ROI
   */
  router.post('/api/analyze', async (req: Request, res: Response) => {
    const request_id = getRequestId(res);

    try {
      const body = asBody(req.body);
      const imageBase64 = optionalString(body, 'imageBase64');
      const imageUrl = optionalString(body, 'imageUrl');
      const energyCostPerKwh = optionalNumber(body, 'energyCostPerKwh') ?? config.roi.energyCostPerKwh;
      const incentiveRate = optionalNumber(body, 'incentiveRate') ?? config.roi.incentiveRate;
      const seed = optionalNumber(body, 'seed');

      if (seed !== undefined && !Number.isInteger(seed)) {
        throw new ValidationError('seed must be an integer', 'seed');
      }

      if (imageBase64 && imageUrl) {
        throw new ValidationError('Provide either imageBase64 or imageUrl, not both');
      }

      let image: RooftopImage;
      if (imageBase64) {
        image = await deps.imageLoader.fromBase64(imageBase64);
      } else if (imageUrl) {
        image = await deps.imageLoader.fromUrl(imageUrl);
      } else {
        res.status(400).json({
          error: 'An image upload (imageBase64) or an image URL (imageUrl) is required',
          code: ErrorCodes.MISSING_IMAGE,
        });
        return;
      }

      // A per-request seed gets its own strategy so the report is reproducible
      const strategy = seed !== undefined ? createAnalysisStrategy(config, { seed }) : deps.strategy;
      const analysis = await strategy.analyze(image);

      const roi = computeRoi(
        analysis.estimatedInstallationCost,
        analysis.expectedAnnualEnergyKwh,
        energyCostPerKwh,
        incentiveRate,
        config.roi.lifespanYears
      );

      logger.info(`Analyzed ${image.width}x${image.height} ${image.source} image`, {
        action: 'analyze',
        request_id,
        solarPotentialPercent: analysis.solarPotentialPercent,
        payback: roi.paybackPeriod.kind,
      });

      res.json({
        requestId: request_id,
        image: {
          width: image.width,
          height: image.height,
          source: image.source,
          mimeType: image.mimeType,
        },
        strategy: strategy.name,
        analysis,
        roi,
        summary: formatReport(analysis, roi),
      });
    } catch (error) {
      sendError(res, error, 'analyze');
    }
  });

  /**
   * POST /api/roi - ROI for user-supplied cost and production
   */
  router.post('/api/roi', (req: Request, res: Response) => {
    try {
      const body = asBody(req.body);
      const roi = computeRoi(
        requiredNumber(body, 'installationCost'),
        requiredNumber(body, 'annualProductionKwh'),
        optionalNumber(body, 'energyCostPerKwh') ?? config.roi.energyCostPerKwh,
        optionalNumber(body, 'incentiveRate') ?? config.roi.incentiveRate,
        optionalNumber(body, 'lifespanYears') ?? config.roi.lifespanYears
      );

      res.json({ roi, summary: formatRoiLines(roi) });
    } catch (error) {
      sendError(res, error, 'roi');
    }
  });

  return router;
}
