export { handleApiRoutes } from './api.js';
export { handleSlideRoutes } from './slides.js';
