import { Request, Response, NextFunction } from 'express';
import logger from '../../utils/Logger';

const loggerMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  res.on('finish', () => {
    logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
  });
  next();
};

export default loggerMiddleware;
