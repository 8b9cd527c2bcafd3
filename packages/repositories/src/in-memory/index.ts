export { createInMemoryRepo } from './repo.js';
