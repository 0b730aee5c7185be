import path from 'path';
import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import { StaticAssetError } from '../../utils/errors';

/** Asset file name mapped to a function locating the file on disk. */
export type AssetTable = Record<string, () => string>;

export function defaultAssets(publicDir: string): AssetTable {
  return {
    'style.css': () => path.join(publicDir, 'style.css'),
    'chartist.min.css': () => require.resolve('chartist/dist/chartist.min.css'),
    'chartist.min.js': () => require.resolve('chartist/dist/chartist.min.js'),
  };
}

export function createAssetsRouter(assets: AssetTable): Router {
  const router = Router();

  for (const [name, locate] of Object.entries(assets)) {
    router.get(`/${name}`, (req: Request, res: Response, next: NextFunction) => {
      const fail = (error: unknown): void => {
        logger.error('Failed to read static asset', {
          asset: name,
          error: error instanceof Error ? error.message : String(error),
        });
        next(new StaticAssetError(`Unable to load ${name}`));
      };

      let filePath: string;
      try {
        filePath = path.resolve(locate());
      } catch (error) {
        fail(error);
        return;
      }

      res.sendFile(filePath, (error) => {
        if (error) {
          fail(error);
        }
      });
    });
  }

  return router;
}
