export { default as evaluateRoutes } from './evaluate-routes.js';
export { default as matchRoutes } from './match-routes.js';
export { default as healthRoutes } from './health-routes.js';
