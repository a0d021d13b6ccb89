export { parseTitleList, readTitleList } from './titles.js';
