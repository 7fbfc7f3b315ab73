export { tasks } from './tasks.js';
export { categories } from './categories.js';
export { config } from './config.js';
export { categoryIdPool, idCounters, CATEGORY_COUNTER } from './id-allocation.js';
