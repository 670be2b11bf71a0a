export { ingestCommand } from './ingest.js';
export { statusCommand } from './status.js';
export { searchCommand } from './search.js';
