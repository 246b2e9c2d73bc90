export { createProxyRoutes } from './proxy.routes.js';
export { ProxyService, ProxyError } from './proxy.service.js';
export { ProxyController } from './proxy.controller.js';
export * from './headers.js';
export * from './transform/json-patcher.js';
export * from './transform/json-body.js';
export * from './transform/sse-filter.js';
