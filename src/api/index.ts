export { createApp, startServer, type AppDeps } from './server.js';
export { errorHandler, errorBody, statusFor, type ErrorBody } from './middleware/error-handler.js';
