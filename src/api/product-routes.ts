import { Router, Request, Response } from 'express';
import { PriceMonitor } from '../services/price-monitor.js';
import { formatIssues, productSchema, productUpdateSchema } from '../storage/config-schema.js';
import { sendError, sendValidationError } from './http-errors.js';

function parseIndex(raw: string): number | null {
  return /^-?\d+$/.test(raw) ? Number(raw) : null;
}

/**
 * Product CRUD. Products are addressed by their position in the list.
 */
export function createProductRouter(monitor: PriceMonitor): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(monitor.listProducts());
  });

  router.post('/', async (req: Request, res: Response) => {
    const parsed = productSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, formatIssues(parsed.error));
      return;
    }

    try {
      res.status(201).json(await monitor.addProduct(parsed.data));
    } catch (error) {
      sendError(res, error, 'POST /products');
    }
  });

  router.put('/:index', async (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    if (index === null) {
      sendValidationError(res, 'Product index must be an integer');
      return;
    }

    const parsed = productUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, formatIssues(parsed.error));
      return;
    }

    try {
      res.json(await monitor.updateProduct(index, parsed.data));
    } catch (error) {
      sendError(res, error, 'PUT /products/:index');
    }
  });

  router.delete('/:index', async (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    if (index === null) {
      sendValidationError(res, 'Product index must be an integer');
      return;
    }

    try {
      const removed = await monitor.deleteProduct(index);
      res.json({ message: `Product '${removed.name}' removed successfully` });
    } catch (error) {
      sendError(res, error, 'DELETE /products/:index');
    }
  });

  return router;
}
