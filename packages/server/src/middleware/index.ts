export { errorHandler } from './error-handler.js';
export { requestLogger } from './request-logger.js';
export { asyncHandler } from './async-handler.js';
export { authenticate, requireUser, viewerId } from './auth.js';
