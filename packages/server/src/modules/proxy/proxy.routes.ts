import { Router, type IRouter } from 'express';
import type { AppContext } from '../../lib/context.js';
import { asyncHandler } from '../../utils/async-handler.js';
import { ProxyController } from './proxy.controller.js';
import { ProxyService } from './proxy.service.js';

export function createProxyRoutes(ctx: AppContext): IRouter {
  const router: IRouter = Router();
  const proxyController = new ProxyController(new ProxyService(ctx));

  router.all(
    '*',
    asyncHandler((req, res) => proxyController.handleProxy(req, res))
  );

  return router;
}
