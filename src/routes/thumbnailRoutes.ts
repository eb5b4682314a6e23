import { Router } from 'express';
import { ThumbnailController } from '../controllers/ThumbnailController';

export const createThumbnailRoutes = (controller: ThumbnailController): Router => {
  const router = Router();

  /**
   * Thumbnail url or markup
   * GET /api/thumbnails/:method
   */
  router.get('/:method', controller.render);

  /**
   * Clear the thumbnail cache
   * DELETE /api/thumbnails
   */
  router.delete('/', controller.clearAll);

  return router;
};
