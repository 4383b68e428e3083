export { MarkdownGenerator } from './markdown.js';
export { JsonGenerator, type JsonOutputOptions, type JsonOutput, type JsonSearch } from './json.js';
export { renderResponse } from './render.js';
