export { createHttpServer } from './server.js';
export { sendJson, sendError, sendPng } from './utils.js';
