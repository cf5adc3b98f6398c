export { default as eventRoutes } from './event-routes.js';
export { default as streamRoutes } from './stream-routes.js';
export { default as indexFolderRoutes } from './index-folder-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { replyWithEngineError } from './error-reply.js';
