export { executeSearch, type ExecuteSearchOptions } from './executeSearch.js';
