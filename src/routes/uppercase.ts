import { Router, Request, Response, NextFunction } from 'express';
import { parseUppercaseRequest } from '../models/uppercase.js';
import { handleUppercase, type UppercaseHandler } from '../services/uppercaseService.js';

export function createUppercaseRouter(handle: UppercaseHandler = handleUppercase): Router {
  const router = Router();

  // POST /api/uppercase - Uppercase the "input" field
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(handle(parseUppercaseRequest(req.body)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createUppercaseRouter();
