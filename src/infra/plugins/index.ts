export { registerCors } from './cors.js';
