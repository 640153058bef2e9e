export { default as ingestRoutes } from './ingest-routes.js';
export { default as healthRoutes } from './health-routes.js';
