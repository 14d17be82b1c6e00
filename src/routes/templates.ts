/**
 * Template routes - read-only catalogue of configuration templates
 */

import express, { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { TemplateService } from '../services/TemplateService';
import {
  parseOrThrow,
  platformSchema,
  templateIdSchema,
} from '../utils/validation';

export interface TemplateRoutesDeps {
  templates: TemplateService;
}

export function createTemplateRoutes(deps: TemplateRoutesDeps): express.Router {
  const router = express.Router();

  /**
   * GET /api/templates?platform=telegram
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const platform =
        req.query.platform === undefined
          ? undefined
          : parseOrThrow(platformSchema, req.query.platform);
      const templates = await deps.templates.listTemplates(platform);

      res.json({
        success: true,
        data: templates,
        count: templates.length,
      });
    }),
  );

  router.get(
    '/:templateId',
    asyncHandler(async (req: Request, res: Response) => {
      const templateId = parseOrThrow(templateIdSchema, req.params.templateId);
      const template = await deps.templates.getTemplate(templateId);
      res.json({ success: true, data: template });
    }),
  );

  return router;
}
