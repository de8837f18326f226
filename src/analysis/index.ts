export { analyzeEvents, analyzeTables } from './pipeline';
