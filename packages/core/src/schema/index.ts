export { objectives } from './objectives.js';
export { priorities } from './priorities.js';
export { deadlines } from './deadlines.js';
export { config } from './config.js';
