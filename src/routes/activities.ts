import { Router, Request, Response, NextFunction } from 'express';
import type { ActivityRegistry } from '../services/registry.js';
import { emailQuerySchema, parseRequest } from '../utils/validation.js';
import { MethodNotAllowedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const methodNotAllowed = (allow: string) => (_req: Request, _res: Response, next: NextFunction) => {
  next(new MethodNotAllowedError(allow));
};

export function createActivitiesRouter(registry: ActivityRegistry): Router {
  // Published paths are exact: no case folding, no trailing-slash aliases
  const router = Router({ caseSensitive: true, strict: true });

  router.get('/', (_req: Request, res: Response) => {
    res.json(registry.list());
  });

  router.post('/:activityName/signup', (req: Request<{ activityName: string }>, res: Response, next: NextFunction) => {
    try {
      const { email } = parseRequest(emailQuerySchema, req.query, 'query');
      logger.debug('[Activities Route] Signup request:', { activityName: req.params.activityName, email });

      res.json(registry.signup(req.params.activityName, email));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:activityName/unregister', (req: Request<{ activityName: string }>, res: Response, next: NextFunction) => {
    try {
      const { email } = parseRequest(emailQuerySchema, req.query, 'query');
      logger.debug('[Activities Route] Unregister request:', { activityName: req.params.activityName, email });

      res.json(registry.unregister(req.params.activityName, email));
    } catch (error) {
      next(error);
    }
  });

  router.all('/', methodNotAllowed('GET'));
  router.all('/:activityName/signup', methodNotAllowed('POST'));
  router.all('/:activityName/unregister', methodNotAllowed('DELETE'));

  return router;
}

export default createActivitiesRouter;
