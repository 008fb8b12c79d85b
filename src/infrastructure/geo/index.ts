export { openMaxmindDatabase } from './maxmind-database.js';
