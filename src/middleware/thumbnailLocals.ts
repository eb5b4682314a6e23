import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ThumbnailHelper } from '../services/thumbnails';

/**
 * Exposes the thumb helper to views as `thumb`.
 */
export const thumbnailLocals = (helper: ThumbnailHelper): RequestHandler => {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.locals.thumb = helper;
    next();
  };
};
