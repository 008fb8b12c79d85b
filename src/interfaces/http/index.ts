export { default as submitRoutes } from './submit-routes.js';
export type { SubmitRoutesOptions } from './submit-routes.js';
export { default as healthRoutes } from './health-routes.js';
