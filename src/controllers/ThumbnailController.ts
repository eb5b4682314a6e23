import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { thumbnailQuerySchema, validate } from '../utils/validation';
import { ThumbnailHelper, ThumbnailManager } from '../services/thumbnails';

export class ThumbnailController {
  constructor(
    private readonly helper: ThumbnailHelper,
    private readonly manager: ThumbnailManager
  ) {}

  /**
   * Runs a helper method, returning a url or an `img` tag
   * GET /api/thumbnails/:method?path=...
   */
  public render = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { method } = req.params;
      const { path, fullBase, alt, class: className, title, ...params } = validate(thumbnailQuerySchema, req.query);

      const result = await this.helper.invoke(method, [path, params, { fullBase, alt, class: className, title }]);

      res.json({
        success: true,
        data: { method, result }
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Deletes every cached thumbnail
   * DELETE /api/thumbnails
   */
  public clearAll = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const deleted = await this.manager.clearAll();
      logger.info('Thumbnail cache cleared', { deleted, requestId: req.correlationId });

      res.json({
        success: true,
        data: { deleted }
      });
    } catch (error) {
      next(error);
    }
  };
}
